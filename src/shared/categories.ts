/**
 * Canonical category/keyword data shared by the matchers, scorer, summarizer and renderers.
 * Single source of truth: update here, changes propagate everywhere.
 */

import { CATEGORY_IDS, type CategoryConfig, type CategoryId } from '../types/index.js';

// General AI vocabulary: relevance check and +5 score per hit
export const AI_KEYWORDS = [
    'AI', 'artificial intelligence', 'machine learning', 'LLM', 'GPT',
    'OpenAI', 'Anthropic', 'deep learning', 'neural', 'chatbot', 'Claude',
    'transformer', 'generative AI', 'large language model', 'computer vision',
    'natural language processing', 'NLP', 'automation', 'robotics'
];

// Headline-grade signals: +15 score per hit
export const HIGH_IMPACT_KEYWORDS = [
    'breakthrough', 'launch', 'release', 'announces', 'unveils',
    'funding', 'raises', 'acquisition', 'billion', 'open source',
    'open-source', 'state-of-the-art', 'outperforms', 'record'
];

// Hosts that earn the credibility bonus (substring of the URL host)
export const CREDIBLE_SOURCES = [
    'arxiv.org', 'openai.com', 'anthropic.com', 'ai.googleblog.com',
    'techcrunch.com', 'venturebeat.com', 'technologyreview.com'
];

// Declaration order is the classifier's tie-break order
export const CATEGORIES: Record<CategoryId, CategoryConfig> = {
    research: {
        emoji: '🧠',
        title: 'Research',
        keywords: ['research', 'paper', 'study', 'arxiv', 'benchmark', 'dataset', 'researchers', 'university', 'scientists', 'findings'],
        sources: ['arxiv.org', 'openreview.net', 'paperswithcode.com', 'research.google', 'deepmind'],
        color: '4285f4',
    },
    tools: {
        emoji: '⚙️',
        title: 'Tools',
        keywords: ['tool', 'api', 'sdk', 'framework', 'library', 'plugin', 'developer', 'platform', 'github', 'release'],
        sources: ['github.com', 'huggingface.co', 'producthunt.com', 'pypi.org', 'npmjs.com'],
        color: '34a853',
    },
    industry: {
        emoji: '📢',
        title: 'Industry',
        keywords: ['funding', 'raises', 'acquisition', 'startup', 'investment', 'ipo', 'valuation', 'partnership', 'revenue', 'market'],
        sources: ['techcrunch.com', 'venturebeat.com', 'bloomberg.com', 'reuters.com', 'cnbc.com'],
        color: 'ea4335',
    },
    'use-case': {
        emoji: '🎯',
        title: 'Use Cases',
        keywords: ['healthcare', 'education', 'finance', 'customer service', 'case study', 'deployment', 'hospital', 'classroom', 'manufacturing', 'doctors'],
        sources: ['hbr.org', 'zdnet.com', 'wired.com', 'fastcompany.com', 'forbes.com'],
        color: 'fbbc04',
    },
    misc: {
        emoji: '🧵',
        title: 'Quick Hits',
        keywords: [],
        sources: [],
        color: '9aa0a6',
    },
};

export function getCategoryConfig(category: CategoryId): CategoryConfig {
    return CATEGORIES[category];
}
