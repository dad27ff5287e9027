import { environment as production } from './environment.prod';

const development = {
  production: false,
  port: 3000,

  // Google Trends upstream settings
  trends: {
    language: 'en',
    tzOffsetMinutes: 360, // minutes west of UTC, as the web client sends it
    requestDelayMs: 1000, // minimum gap between upstream requests
    requestTimeoutMs: 30000,
    maxComparisonItems: 5, // explore widgets compare at most 5 items
    batchKeywordLimit: 500, // batch showcase keywords per request
    allTimeStart: '2004-01-01', // first day of data behind 'all'
  },

  // Cache Settings (in seconds)
  cache: {
    lookupTtl: 86400, // 24 hours for geo/category picker trees
  },

  // CORS
  frontendUrl: 'http://localhost:4200',
};

// Production values are read from the process environment
export const environment =
  process.env['NODE_ENV'] === 'production' ? production : development;
