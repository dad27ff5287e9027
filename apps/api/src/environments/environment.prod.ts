export const environment = {
  production: true,
  port: process.env['PORT'] ? parseInt(process.env['PORT'], 10) : 3000,

  trends: {
    language: process.env['TRENDS_LANGUAGE'] || 'en',
    tzOffsetMinutes: process.env['TRENDS_TZ']
      ? parseInt(process.env['TRENDS_TZ'], 10)
      : 360,
    requestDelayMs: process.env['TRENDS_REQUEST_DELAY_MS']
      ? parseInt(process.env['TRENDS_REQUEST_DELAY_MS'], 10)
      : 1000,
    requestTimeoutMs: process.env['TRENDS_TIMEOUT_MS']
      ? parseInt(process.env['TRENDS_TIMEOUT_MS'], 10)
      : 30000,
    maxComparisonItems: 5,
    batchKeywordLimit: 500,
    allTimeStart: '2004-01-01',
  },

  cache: {
    lookupTtl: 86400,
  },

  frontendUrl: process.env['FRONTEND_URL'] || 'http://localhost:4200',
};
