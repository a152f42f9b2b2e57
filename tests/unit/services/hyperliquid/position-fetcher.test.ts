import {
  HttpPoster,
  HyperliquidPositionFetcher,
  parseClearinghouseState,
} from '@/services/hyperliquid/position-fetcher';
import { ApiError, RateLimitError } from '@/utils/error-handler';

describe('HyperliquidPositionFetcher', () => {
  const address = '0xb317d2bc2d3d2df5fa441b5bae0ab9d8d07283ae';
  const config = {
    infoUrl: 'https://info.test/info',
    timeoutMs: 30000,
    maxAttempts: 3,
    retryBaseDelayMs: 1000,
  };

  let post: jest.Mock;
  let wait: jest.Mock<Promise<void>, [number]>;
  let fetcher: HyperliquidPositionFetcher;

  const response = (status: number, data: unknown = {}) => ({ status, data });

  beforeEach(() => {
    post = jest.fn();
    wait = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    const http: HttpPoster = { post };
    fetcher = new HyperliquidPositionFetcher(config, http, wait);
  });

  it('posts a clearinghouseState request and parses positions', async () => {
    post.mockResolvedValue(
      response(200, {
        assetPositions: [
          { position: { coin: 'btc', szi: '0.5', positionValue: '30000.5' } },
          { position: { coin: 'ETH', szi: '-12.25', positionValue: '36750' } },
        ],
      })
    );

    const positions = await fetcher.fetchPositions(address);

    expect(post).toHaveBeenCalledWith(
      config.infoUrl,
      { type: 'clearinghouseState', user: address, dex: '' },
      expect.objectContaining({ timeout: 30000 })
    );
    expect(positions).toEqual(
      new Map([
        ['BTC', { size: 0.5, usdValue: 30000.5 }],
        ['ETH', { size: -12.25, usdValue: 36750 }],
      ])
    );
  });

  it('returns an empty map when there are no positions', async () => {
    post.mockResolvedValue(response(200, { marginSummary: {} }));
    expect(await fetcher.fetchPositions(address)).toEqual(new Map());
  });

  it('retries rate limits and server errors with exponential backoff', async () => {
    post
      .mockResolvedValueOnce(response(429))
      .mockResolvedValueOnce(response(502))
      .mockResolvedValueOnce(response(200, { assetPositions: [] }));

    await expect(fetcher.fetchPositions(address)).resolves.toEqual(new Map());

    expect(post).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[1000], [2000]]);
  });

  it('gives up after the last attempt on repeated rate limits', async () => {
    post.mockResolvedValue(response(429));

    await expect(fetcher.fetchPositions(address)).rejects.toBeInstanceOf(RateLimitError);
    expect(post).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt on repeated server errors', async () => {
    post.mockResolvedValue(response(500));

    const error = await fetcher.fetchPositions(address).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 500 });
  });

  it('fails at once on client errors', async () => {
    post.mockResolvedValue(response(422));

    await expect(fetcher.fetchPositions(address)).rejects.toThrow(
      `Position request rejected for ${address} with status 422`
    );
    expect(post).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it('retries transport failures and recovers', async () => {
    post
      .mockRejectedValueOnce(new Error('timeout of 30000ms exceeded'))
      .mockResolvedValueOnce(
        response(200, { assetPositions: [{ position: { coin: 'BTC', szi: '1', positionValue: '60000' } }] })
      );

    const positions = await fetcher.fetchPositions(address);

    expect(positions).toEqual(new Map([['BTC', { size: 1, usdValue: 60000 }]]));
    expect(post).toHaveBeenCalledTimes(2);
    expect(wait.mock.calls).toEqual([[1000]]);
  });

  it('gives up with a 503 after repeated transport failures', async () => {
    post.mockRejectedValue(new Error('socket hang up'));

    const error = await fetcher.fetchPositions(address).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      statusCode: 503,
      message: `Position request failed for ${address} after 3 attempts: socket hang up`,
    });
    expect(post).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[1000], [2000]]);
  });
});

describe('parseClearinghouseState', () => {
  const address = '0xb317d2bc2d3d2df5fa441b5bae0ab9d8d07283ae';

  it('skips malformed entries and keeps the rest', () => {
    const positions = parseClearinghouseState(
      {
        assetPositions: [
          { position: { coin: 'SOL', szi: 'not-a-number', positionValue: '100' } },
          { position: { szi: '1' } },
          'garbage',
          { position: { coin: 'HYPE', szi: 250 } },
          { position: { coin: 'DOGE', szi: '0.0', positionValue: '0' } },
        ],
      },
      address
    );

    expect(positions).toEqual(new Map([['HYPE', { size: 250, usdValue: 0 }]]));
  });

  it('rejects a response that is not an object', () => {
    expect(() => parseClearinghouseState('oops', address)).toThrow(ApiError);
    expect(() => parseClearinghouseState({ assetPositions: 'nope' }, address)).toThrow(
      `Malformed clearinghouseState response for ${address}`
    );
  });
});
