export interface Feed {
  id: number;
  title: string;
  url: string;
  site_url: string | null;
  description: string | null;
  last_fetched: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface FeedInput {
  title: string;
  url: string;
  site_url?: string | null;
  description?: string | null;
}
