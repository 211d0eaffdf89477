/**
 * MyAnimeList CSS Selectors
 *
 * Markup locations for the ranking, profile and review pages. Extraction
 * logic receives these as data; swap this object when the markup changes.
 */

export const MYANIMELIST_SELECTORS = {
  listing: {
    // One <tr> per ranked title
    row: 'tr.ranking-list',
    rank: 'span.top-anime-rank-text',
    titleLink: 'h3.anime_ranking_h3 a',
    score: 'span.score-label',
    // "TV (64 eps) / aired range / members" text block
    information: 'div.information',
  },

  detail: {
    canonical: 'link[rel="canonical"]',
    title: 'h1.title-name, h1',
    score: 'div.score-label',
    synopsis: 'p[itemprop="description"]',

    // "label: value" blocks
    attributeBlocks: 'div.leftside div.spaceit_pad',
    statsBlocks: 'div.stats-block div.spaceit_pad',

    genres: 'div.leftside span[itemprop="genre"]',
    studios: 'div.leftside span.dark_text:contains("Studios:") ~ a',
  },

  reviews: {
    item: 'div.review-element',
    reviewer: 'div.username a',
    date: 'div.update_at',
    score: 'div.rating span',
    content: 'div.text',
    helpful: 'div.helpful_yes span',
  },
} as const

export interface MyAnimeListSelectors {
  listing: Record<keyof typeof MYANIMELIST_SELECTORS.listing, string>
  detail: Record<keyof typeof MYANIMELIST_SELECTORS.detail, string>
  reviews: Record<keyof typeof MYANIMELIST_SELECTORS.reviews, string>
}
