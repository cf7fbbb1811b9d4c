export const CATEGORY_IDS = ['research', 'tools', 'industry', 'use-case', 'misc'] as const;

export type CategoryId = typeof CATEGORY_IDS[number];

export type SummaryStyle = 'editorial' | 'rundown' | 'basic';

export type CategoryConfig = {
    emoji: string;
    title: string;
    keywords: string[];
    sources: string[];
    /** Hex colour (no #) used for the placeholder image */
    color: string;
};

export type ImageSource = 'article' | 'og:image' | 'twitter:image' | 'content' | 'arxiv' | 'fallback';

export type ImageInfo = {
    url: string;
    source: ImageSource;
    width?: number;
    height?: number;
};

export type Article = {
    title: string;
    url: string;
    text: string;
    imageUrl?: string;
    /** Parsed publish time, or the raw feed value when it could not be parsed */
    publishDate?: Date | string;
    sourceCategory: CategoryId;
    sourceFeed: string;
    category: CategoryId;
    popularityScore: number;
    upvotes?: number;
    comments?: number;
    shares?: number;
    authors?: string[];
    metaDescription?: string;
    imageInfo?: ImageInfo;
};

// Article as it leaves a feed or API, before extraction/scoring/categorization
export type RawArticle = {
    title: string;
    url: string;
    sourceCategory: CategoryId;
    sourceFeed: string;
    publishDate?: Date | string;
    imageUrl?: string;
    upvotes?: number;
    comments?: number;
};

export type ExtractedContent = {
    text: string;
    imageUrl?: string;
    authors?: string[];
    publishDate?: Date;
    metaDescription?: string;
};

export type FetchResult = {
    status: 'ok' | 'error';
    articles: RawArticle[];
    error?: { type: string; message: string; httpStatus?: number };
    meta: { feed: string; fetchedRaw: number; kept: number; durationMs: number };
};

export type FeedConfig = {
    url: string;
    name: string;
    category: CategoryId;
    timeout?: number;
    headers?: Record<string, string>;
    enabled?: boolean;
};

// RSS Parser types for raw feed items
export interface RawRSSItem {
    title?: string;
    link?: string;
    guid?: string;
    pubDate?: string;
    isoDate?: string;
    content?: string;
    'content:encoded'?: string;
    contentSnippet?: string;
    creator?: string;
    enclosure?: { url?: string; type?: string };
    'media:content'?: RSSMediaContent | RSSMediaContent[];
    'media:thumbnail'?: RSSMediaContent | RSSMediaContent[];
}

export interface RSSMediaContent {
    url?: string;
    $?: { url?: string; medium?: string; type?: string };
}

// =============================================================================
// NEWSLETTER CONTENT
// =============================================================================

export type ArticleSummary = {
    article: Article;
    content: string;
};

export type EditorsTake = {
    title: string;
    url: string;
    take: string;
};

export type GenerationInfo = {
    llmUsed: string;
    timestamp: string;
    totalArticles: number;
    categories: CategoryId[];
};

export type NewsletterContent = {
    intro: string;
    summaries: ArticleSummary[];
    editorsTakes: EditorsTake[];
    categorizedSummaries: Partial<Record<CategoryId, string[]>>;
    articles: Article[];
    generationInfo: GenerationInfo;
};

export type GenerationStats = {
    totalArticles: number;
    summariesGenerated: number;
    editorsTakes: number;
    categories: number;
    imagesProcessed: number;
};

export type OutputFiles = Partial<Record<'premiumHtml' | 'emailHtml' | 'templateHtml' | 'markdown' | 'json', string>>;

export type GenerationResult = {
    content: NewsletterContent;
    articles: Article[];
    files: OutputFiles;
    timestamp: string;
    stats: GenerationStats;
};
