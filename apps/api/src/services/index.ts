export * from './cache.service';
export * from './timeframe-parser.service';
export * from './multirange-validator.service';
export * from './request-plan-builder.service';
export * from './response-decoder.service';
export * from './series-aligner.service';
export * from './lookup.service';
export * from './trends.service';
