export interface ExtractedArticle {
  text: string;
  title: string;
  url?: string;
  author?: string;
  date?: string;
  siteName?: string;
}

export interface ArticleExtractor {
  extract(url: string): Promise<ExtractedArticle>;
}
