/**
 * Storage for post files. Paths are relative to the posts root and use `/`.
 */
export interface PostRepository {
  list(): Promise<string[]>;
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}
