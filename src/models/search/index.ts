// Activity search — public API

export type { SearchQuery, SearchQueryDisplay } from "./query";
export { categoryValues, emptySearchQuery, isActive, toDisplay, toUrlString, encodeQueryValue } from "./query";
export type { SearchParams } from "./parseQuery";
export { parseSearchQuery } from "./parseQuery";
export { applySearchQuery, InvalidQueryError } from "./applySearchQuery";
