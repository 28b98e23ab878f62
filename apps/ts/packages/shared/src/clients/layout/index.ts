export { MetadataClient } from './MetadataClient';
export { GET_LAYOUT_OPERATION, GET_LAYOUT_QUERY } from './queries';
export { buildLayoutQuery, parseRevisionResponse, RevisionClient } from './RevisionClient';
export type { LayoutQueryRequest, MetadataFetcher, RevisionFetcher, RevisionPayload } from './types';
