export { assetFtEndpoint, RestQuerier, type RestQuerierConfig } from './rest-querier.js';
