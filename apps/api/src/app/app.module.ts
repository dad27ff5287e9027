import { Module } from '@nestjs/common';

// Services
import {
  CacheService,
  TimeframeParserService,
  MultirangeValidatorService,
  RequestPlanBuilderService,
  ResponseDecoderService,
  SeriesAlignerService,
  LookupService,
  TrendsService,
} from '../services';

// Controllers
import { TrendsController, LookupController, ExportController } from '../controllers';

// Upstream access
import { TrendsTransport } from '../transport/trends-transport';
import { HttpTrendsTransport } from '../transport/http-trends-transport.service';

@Module({
  imports: [],
  controllers: [TrendsController, LookupController, ExportController],
  providers: [
    CacheService,
    TimeframeParserService,
    MultirangeValidatorService,
    RequestPlanBuilderService,
    ResponseDecoderService,
    SeriesAlignerService,
    LookupService,
    TrendsService,
    { provide: TrendsTransport, useClass: HttpTrendsTransport },
  ],
})
export class AppModule {}
