import { FeedConfig } from '../types/index.js';

// Browser headers to bypass 403 errors
export const BROWSER_HEADERS = {
    "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Accept": "application/rss+xml, application/xml, text/xml, */*",
    "Accept-Language": "en-US,en;q=0.9",
    "Cache-Control": "no-cache"
};

// Page requests (article extraction, image probing)
export const PAGE_HEADERS = {
    ...BROWSER_HEADERS,
    "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8"
};

// Hacker News: look at the first 20 of the top 50 stories
export const HACKER_NEWS_TOP_LIMIT = 50;
export const HACKER_NEWS_SCAN_LIMIT = 20;
export const HACKER_NEWS_ITEM_DELAY_MS = 100;

export const RSS_TIMEOUT_MS = 10000;
export const PAGE_TIMEOUT_MS = 15000;

// Grouped by the category each feed mostly covers (becomes Article.sourceCategory)
export const RSS_FEEDS: FeedConfig[] = [
    // ============================================
    // RESEARCH
    // ============================================
    {
        url: "https://rss.arxiv.org/rss/cs.AI",
        name: "arXiv cs.AI",
        category: "research",
        timeout: 20000
    },
    {
        url: "https://research.google/blog/rss/",
        name: "Google Research Blog",
        category: "research"
    },

    // ============================================
    // TOOLS
    // ============================================
    {
        url: "https://huggingface.co/blog/feed.xml",
        name: "Hugging Face Blog",
        category: "tools"
    },
    {
        url: "https://github.blog/ai-and-ml/feed/",
        name: "GitHub Blog AI & ML",
        category: "tools",
        headers: BROWSER_HEADERS
    },

    // ============================================
    // INDUSTRY
    // ============================================
    {
        url: "https://venturebeat.com/category/ai/feed/",
        name: "VentureBeat AI",
        category: "industry",
        headers: BROWSER_HEADERS
    },
    {
        url: "https://techcrunch.com/category/artificial-intelligence/feed/",
        name: "TechCrunch AI",
        category: "industry",
        headers: BROWSER_HEADERS
    },

    // ============================================
    // USE CASES
    // ============================================
    {
        url: "https://www.technologyreview.com/feed/",
        name: "MIT Technology Review",
        category: "use-case"
    },

    // ============================================
    // GENERAL TECH
    // ============================================
    {
        url: "https://www.theverge.com/rss/index.xml",
        name: "The Verge",
        category: "misc"
    },
    {
        url: "https://www.wired.com/feed/tag/ai/latest/rss",
        name: "Wired AI",
        category: "misc",
        enabled: false  // Frequently returns 403 to non-browser clients
    }
];
