import { Test } from '@nestjs/testing';
import { EmptyResultError, MalformedTimeframeError } from '../errors/trends.errors';
import { TrendsService } from '../services/trends.service';
import { TrendsController } from './trends.controller';

describe('TrendsController', () => {
  const trendsService = {
    interestOverTime: jest.fn(),
    showcaseTimeline: jest.fn(),
    trendingNow: jest.fn(),
    previewTimeframe: jest.fn(),
  };
  let controller: TrendsController;

  beforeEach(async () => {
    jest.resetAllMocks();
    const module = await Test.createTestingModule({
      controllers: [TrendsController],
      providers: [{ provide: TrendsService, useValue: trendsService }],
    }).compile();

    controller = module.get(TrendsController);
  });

  it('splits list parameters', async () => {
    trendsService.interestOverTime.mockResolvedValue({ mode: 'single-range' });

    const response = await controller.getInterestOverTime({
      keywords: 'tea, coffee',
      timeframe: 'today 3-m',
      geo: 'US',
    });

    expect(response).toEqual({ success: true, data: { mode: 'single-range' } });
    expect(trendsService.interestOverTime).toHaveBeenCalledWith({
      keywords: ['tea', 'coffee'],
      timeframes: ['today 3-m'],
      geos: ['US'],
    });
  });

  it('defaults to worldwide over the past year', async () => {
    trendsService.interestOverTime.mockResolvedValue({});
    await controller.getInterestOverTime({ keywords: 'tea' });
    expect(trendsService.interestOverTime).toHaveBeenCalledWith({
      keywords: ['tea'],
      timeframes: ['today 12-m'],
      geos: [''],
    });
  });

  it('reports a missing parameter', async () => {
    await expect(controller.getInterestOverTime({})).resolves.toEqual({
      success: false,
      error: 'Missing required parameter: keywords',
      code: 'InvalidParameter',
    });
    expect(trendsService.interestOverTime).not.toHaveBeenCalled();
  });

  it('rejects an unknown showcase window', async () => {
    const response = await controller.getShowcase({ keywords: 'tea', window: 'Past1H' });
    expect(response).toMatchObject({ success: false, code: 'InvalidParameter' });
  });

  it('marks empty results', async () => {
    trendsService.interestOverTime.mockRejectedValue(new EmptyResultError('time', ['tea']));
    await expect(controller.getInterestOverTime({ keywords: 'tea' })).resolves.toEqual({
      success: false,
      error: 'No time data returned for "tea"',
      code: 'EmptyResult',
      empty: true,
    });
  });

  it('returns pipeline errors with their code', async () => {
    trendsService.previewTimeframe.mockImplementation(() => {
      throw new MalformedTimeframeError('now', 'missing offset');
    });
    expect(controller.previewTimeframe({ timeframe: 'now' })).toEqual({
      success: false,
      error: 'Malformed timeframe "now": missing offset',
      code: 'MalformedTimeframe',
    });
  });

  it('lets unexpected errors through', async () => {
    trendsService.showcaseTimeline.mockRejectedValue(new TypeError('boom'));
    await expect(controller.getShowcase({ keywords: 'tea' })).rejects.toThrow('boom');
  });

  it('reads trending hours as a number', async () => {
    trendsService.trendingNow.mockResolvedValue([]);
    await controller.getTrending({ geo: 'GB', hours: '4' });
    expect(trendsService.trendingNow).toHaveBeenCalledWith({ geo: 'GB', hours: 4 });
  });
});
