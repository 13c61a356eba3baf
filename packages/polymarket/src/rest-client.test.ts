import { describe, it, expect, vi } from 'vitest';
import Decimal from 'decimal.js';
import { ExchangeRequestError } from '@strike-quoter/core';
import { ClobRestClient } from './rest-client.js';
import { GammaClient } from './gamma-client.js';
import type { FetchLike } from './http.js';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(...bodies: Array<{ body: unknown; status?: number }>) {
  const fetchImpl = vi.fn<FetchLike>();
  for (const { body, status } of bodies) {
    fetchImpl.mockResolvedValueOnce(jsonResponse(body, status));
  }
  return fetchImpl;
}

function sentBody(fetchImpl: ReturnType<typeof stubFetch>, call: number = 0): unknown {
  const init = fetchImpl.mock.calls[call][1];
  return JSON.parse(String(init?.body));
}

describe('ClobRestClient', () => {
  it('should post an order carrying the fee rate', async () => {
    const fetchImpl = stubFetch({ body: { success: true, orderID: '0xorder1' } });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test/', apiKey: 'test-key', fetchImpl });

    const orderId = await client.submit({
      tokenId: 'token-yes',
      side: 'buy',
      price: new Decimal('0.5875'),
      size: new Decimal(20),
      feeRateBps: 1000,
    });

    expect(orderId).toBe('0xorder1');
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://clob.example.test/order');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
    expect(sentBody(fetchImpl)).toEqual({
      order: {
        tokenID: 'token-yes',
        side: 'BUY',
        price: '0.5875',
        size: '20',
        feeRateBps: '1000',
      },
      orderType: 'GTC',
    });
  });

  it('should reject an order the exchange did not accept', async () => {
    const fetchImpl = stubFetch({ body: { success: false, errorMsg: 'invalid fee rate' } });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', fetchImpl });

    await expect(
      client.submit({
        tokenId: 'token-yes',
        side: 'sell',
        price: new Decimal('0.6'),
        size: new Decimal(5),
        feeRateBps: 0,
      })
    ).rejects.toThrow('Order rejected: invalid fee rate');
  });

  it('should surface HTTP errors with their status', async () => {
    const fetchImpl = stubFetch({ body: { error: 'unauthorized' }, status: 401 });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', fetchImpl });

    const error = await client.listOpenOrders().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExchangeRequestError);
    if (error instanceof ExchangeRequestError) {
      expect(error.status).toBe(401);
      expect(error.retryable).toBe(true);
    }
  });

  it('should surface transport failures', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockRejectedValueOnce(new Error('socket hang up'));
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', fetchImpl });

    await expect(client.feeRate('token-yes')).rejects.toThrow(
      'Request to /fee-rate?token_id=token-yes failed: socket hang up'
    );
  });

  it('should fail a cancel the exchange refused', async () => {
    const fetchImpl = stubFetch(
      { body: { canceled: ['a'], not_canceled: {} } },
      { body: { canceled: [], not_canceled: { b: 'order already matched' } } }
    );
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', fetchImpl });

    await expect(client.cancel('a')).resolves.toBeUndefined();
    await expect(client.cancel('b')).rejects.toThrow('Order b not cancelled: order already matched');
    expect(sentBody(fetchImpl, 1)).toEqual({ orderID: 'b' });
  });

  it('should read open orders from a cursor page', async () => {
    const fetchImpl = stubFetch({ body: { data: [{ id: 'o1' }, { id: 'o2' }], next_cursor: 'LTE=' } });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', fetchImpl });

    expect(await client.listOpenOrders()).toEqual(['o1', 'o2']);
  });

  it('should read the base fee rate', async () => {
    const fetchImpl = stubFetch({ body: { base_fee: 1000 } });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', fetchImpl });

    expect(await client.feeRate('token yes')).toBe(1000);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://clob.example.test/fee-rate?token_id=token%20yes');
  });

  it('should map trades into fills', async () => {
    const fetchImpl = stubFetch({
      body: [
        {
          id: 't1',
          taker_order_id: 'o1',
          asset_id: 'token-yes',
          side: 'SELL',
          price: '0.6',
          size: '10',
          fee_rate_bps: '100',
          match_time: '1767614400',
        },
      ],
    });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', fetchImpl });

    const fills = await client.listFills(new Date('2026-01-05T12:00:00Z'));

    expect(fetchImpl.mock.calls[0][0]).toBe('https://clob.example.test/data/trades?after=1767614400');
    expect(fills).toHaveLength(1);
    expect(fills[0].side).toBe('sell');
    expect(fills[0].fee.toString()).toBe('0.06');
    expect(fills[0].timestamp.toISOString()).toBe('2026-01-05T12:00:00.000Z');
  });

  it('should book a maker trade from our own maker order, not the taker side', async () => {
    const fetchImpl = stubFetch({
      body: [
        {
          id: 't2',
          taker_order_id: 'their-order',
          asset_id: 'token-yes',
          side: 'BUY',
          price: '0.61',
          size: '15',
          match_time: '1767614460',
          trader_side: 'MAKER',
          maker_orders: [
            {
              order_id: 'our-sell',
              owner: 'test-key',
              asset_id: 'token-yes',
              side: 'SELL',
              price: '0.6025',
              matched_amount: '10',
              fee_rate_bps: '0',
            },
            {
              order_id: 'other-maker',
              owner: 'someone-else',
              asset_id: 'token-yes',
              side: 'SELL',
              price: '0.61',
              matched_amount: '5',
            },
          ],
        },
      ],
    });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', apiKey: 'test-key', fetchImpl });

    const fills = await client.listFills(new Date('2026-01-05T12:00:00Z'));

    expect(fills).toHaveLength(1);
    expect(fills[0].id).toBe('t2:our-sell');
    expect(fills[0].orderId).toBe('our-sell');
    expect(fills[0].tokenId).toBe('token-yes');
    expect(fills[0].side).toBe('sell');
    expect(fills[0].price.toString()).toBe('0.6025');
    expect(fills[0].size.toString()).toBe('10');
    expect(fills[0].fee.toString()).toBe('0');
    expect(fills[0].timestamp.toISOString()).toBe('2026-01-05T12:01:00.000Z');
  });

  it('should match maker orders by funder address and narrow fills to one token', async () => {
    const fetchImpl = stubFetch({
      body: {
        data: [
          {
            id: 't3',
            taker_order_id: 'their-order',
            asset_id: 'token-yes',
            side: 'SELL',
            price: '0.6',
            size: '4',
            match_time: '1767614400',
            trader_side: 'MAKER',
            maker_orders: [
              { order_id: 'our-buy', maker_address: '0xABC', price: '0.5975', matched_amount: '4' },
            ],
          },
          {
            id: 't4',
            taker_order_id: 'o9',
            asset_id: 'token-no',
            side: 'BUY',
            price: '0.4',
            size: '2',
            match_time: '1767614400',
          },
        ],
      },
    });
    const client = new ClobRestClient({ baseUrl: 'https://clob.example.test', makerAddress: '0xabc', fetchImpl });

    const fills = await client.listFills(new Date('2026-01-05T12:00:00Z'), 'token-yes');

    expect(fills.map((fill) => [fill.id, fill.orderId, fill.tokenId, fill.side, fill.size.toString()])).toEqual([
      ['t3:our-buy', 'our-buy', 'token-yes', 'buy', '4'],
    ]);
  });
});

describe('GammaClient', () => {
  it('should decode active instruments with their outcome tokens', async () => {
    const fetchImpl = stubFetch({
      body: [
        {
          id: 101,
          question: 'Bitcoin Up or Down 15m - above $83,000?',
          active: true,
          closed: false,
          outcomes: '["Yes", "No"]',
          clobTokenIds: '["tok-yes", "tok-no"]',
        },
        {
          id: '102',
          question: 'Closed market',
          active: true,
          closed: true,
          outcomes: '["Yes", "No"]',
          clobTokenIds: '["a", "b"]',
        },
      ],
    });
    const client = new GammaClient({ baseUrl: 'https://gamma.example.test', fetchImpl });

    const entries = await client.getActiveInstruments();

    expect(fetchImpl.mock.calls[0][0]).toBe(
      'https://gamma.example.test/markets?active=true&closed=false&limit=500'
    );
    expect(entries).toEqual([
      {
        id: '101',
        description: 'Bitcoin Up or Down 15m - above $83,000?',
        active: true,
        tokens: [
          { tokenId: 'tok-yes', outcome: 'Yes' },
          { tokenId: 'tok-no', outcome: 'No' },
        ],
      },
    ]);
  });
});
