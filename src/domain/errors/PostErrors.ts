import type { Diagnostic } from "../entities/Diagnostic.js";

export class PostFormatError extends Error {
  constructor(
    readonly path: string,
    readonly diagnostics: Diagnostic[]
  ) {
    const details = diagnostics.map((d) => d.message).join("; ");
    super(
      details
        ? `Post ${path} is not well formed: ${details}`
        : `Post ${path} is not well formed`
    );
    this.name = "PostFormatError";
  }
}

export class PostNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Post not found: ${path}`);
    this.name = "PostNotFoundError";
  }
}

export class PostExistsError extends Error {
  constructor(readonly path: string) {
    super(`Post already exists: ${path}`);
    this.name = "PostExistsError";
  }
}
