import type { Post } from "../entities/Post.js";

export interface CategoryEntry {
  name: string;
  posts: Post[];
}

export interface ArchiveMonth {
  month: string; // MM
  posts: Post[];
}

export interface ArchiveYear {
  year: string;
  months: ArchiveMonth[];
}

export class CategoryService {
  sortPosts(posts: Post[]): Post[] {
    return [...posts].sort(
      (a, b) =>
        b.date.getTime() - a.date.getTime() || a.path.localeCompare(b.path)
    );
  }

  buildCategoryIndex(posts: Post[]): CategoryEntry[] {
    const byCategory = new Map<string, Post[]>();

    for (const post of this.sortPosts(posts)) {
      if (!post.published) continue;
      for (const category of post.categories) {
        const entries = byCategory.get(category) ?? [];
        entries.push(post);
        byCategory.set(category, entries);
      }
    }

    return Array.from(byCategory, ([name, categoryPosts]) => ({
      name,
      posts: categoryPosts,
    })).sort((a, b) =>
      a.name.localeCompare(b.name, undefined, { sensitivity: "base" })
    );
  }

  // Grouped by the year and month the post date was written for, newest first
  buildArchive(posts: Post[]): ArchiveYear[] {
    const byYear = new Map<string, Map<string, Post[]>>();

    for (const post of this.sortPosts(posts)) {
      if (!post.published) continue;
      const year = post.day.slice(0, 4);
      const month = post.day.slice(5, 7);

      const months = byYear.get(year) ?? new Map<string, Post[]>();
      const monthPosts = months.get(month) ?? [];
      monthPosts.push(post);
      months.set(month, monthPosts);
      byYear.set(year, months);
    }

    return Array.from(byYear, ([year, months]) => ({
      year,
      months: Array.from(months, ([month, monthPosts]) => ({
        month,
        posts: monthPosts,
      })).sort((a, b) => b.month.localeCompare(a.month)),
    })).sort((a, b) => b.year.localeCompare(a.year));
  }
}
