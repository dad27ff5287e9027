export * from './trends.controller';
export * from './lookup.controller';
export * from './export.controller';
