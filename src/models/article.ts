export interface Article {
  id: number;
  feed_id: number;
  guid: string;
  title: string;
  url: string;
  author: string | null;
  content: string | null;
  content_text: string | null;
  published_at: Date | null;
  fetched_at: Date;
  feed_title: string;
}

/** A parsed feed entry that has not been reconciled against the store yet. */
export interface ArticleInput {
  feed_id: number;
  guid: string;
  title: string;
  url: string;
  author?: string | null;
  content?: string | null;
  content_text?: string | null;
  published_at?: Date | null;
}

export type UpsertResult =
  | { status: 'inserted'; id: number }
  | { status: 'updated'; id: number }
  | { status: 'suppressed' };

export interface UpsertCounts {
  inserted: number;
  updated: number;
  suppressed: number;
}

export interface ArticleKey {
  feed_id: number;
  guid: string;
}

export interface Tombstone extends ArticleKey {
  deleted_at: Date;
}

export interface Summary {
  id: number;
  article_id: number;
  content: string;
  model_version: string;
  generated_at: Date;
}

export interface Bookmark {
  article_id: number;
  bookmark_id: number;
  tags: string[];
  saved_at: Date;
}
