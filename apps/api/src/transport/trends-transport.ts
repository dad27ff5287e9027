import { UpstreamCall } from '@trendlens/shared-types';

/**
 * Issues one upstream call and returns the raw response text.
 * Used as the injection token so tests can swap in a fake.
 */
export abstract class TrendsTransport {
  abstract execute(call: UpstreamCall): Promise<string>;
}
