export { createMyAnimeListAdapter, myanimelistAdapter } from './adapter.js'
export type { MyAnimeListAdapterOptions } from './adapter.js'
export { MYANIMELIST_SELECTORS } from './selectors.js'
export type { MyAnimeListSelectors } from './selectors.js'
