import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AppContainer } from '../bootstrap/AppContainer.js';
import { createSilentLogger } from '../logging/Logger.js';
import { createApp } from './createApp.js';

const statement = [
  'Chase Freedom Credit Card',
  'Statement Date: 02/05/2024',
  'New Balance: $1,234.56',
  '01/15/2024 AMAZON MKTP US -45.67',
  '01/20/2024 STARBUCKS STORE 1234 -5.75',
].join('\n');

describe('HTTP API', () => {
  let container: AppContainer;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    container = new AppContainer({
      config: {
        store: { path: ':memory:' },
        ingestion: { forceReimport: false },
        logging: { level: 'error' },
        server: { port: 0 },
      },
      logger: createSilentLogger(),
    });
    server = await new Promise<Server>((resolve) => {
      const listening = createApp(container).listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    baseUrl = typeof address === 'object' && address ? `http://127.0.0.1:${address.port}` : '';
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    container.close();
  });

  const upload = (fileName: string, content: string) => {
    const form = new FormData();
    form.append('document', new Blob([content], { type: 'text/plain' }), fileName);
    return fetch(`${baseUrl}/api/ingest`, { method: 'POST', body: form });
  };

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ name: 'ledger-ingest', version: '0.1.0', status: 'ok' });
  });

  it('ingests an uploaded statement and serves its records', async () => {
    const response = await upload('chase-feb.txt', statement);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'imported', documentKind: 'statement' });

    const transactions = await (await fetch(`${baseUrl}/api/transactions?startDate=2024-01-16`)).json();
    expect(transactions).toMatchObject([{ date: '2024-01-20', amount: -5.75, bankName: 'Chase' }]);

    const latest = await (await fetch(`${baseUrl}/api/balances/latest`)).json();
    expect(latest).toMatchObject([{ balance: 1234.56, accountType: 'credit_card' }]);

    const statistics = await (await fetch(`${baseUrl}/api/statistics`)).json();
    expect(statistics).toMatchObject({ importedFiles: 1, transactions: 2, balances: 1 });
  });

  it('rejects unsupported uploads and bad filters', async () => {
    const rejected = await upload('photo.png', 'not a statement');
    expect(rejected.status).toBe(400);

    const missing = await fetch(`${baseUrl}/api/ingest`, { method: 'POST' });
    expect(missing.status).toBe(400);

    const badFilter = await fetch(`${baseUrl}/api/transactions?startDate=last-week`);
    expect(badFilter.status).toBe(400);
    expect(await badFilter.json()).toEqual({ error: 'startDate: Expected YYYY-MM-DD' });
  });

  it('serves spending analytics and a debt payoff comparison', async () => {
    await upload('chase-feb.txt', statement);

    const monthly = await (await fetch(`${baseUrl}/api/analytics/monthly?year=2024`)).json();
    expect(monthly).toEqual([
      { month: '2024-01', transactionCount: 2, income: 0, spending: 51.42, net: -51.42, averageTransaction: -25.71 },
    ]);

    const merchants = await (await fetch(`${baseUrl}/api/analytics/merchants?limit=1`)).json();
    expect(merchants).toHaveLength(1);

    const payoff = await (await fetch(`${baseUrl}/api/debt/payoff?monthlyPayment=2000`)).json();
    expect(payoff).toMatchObject({
      snowball: { totalDebt: 1234.56, monthsToPayoff: 1, feasible: true },
      avalanche: { totalDebt: 1234.56, monthsToPayoff: 1, feasible: true },
      recommendation: 'Both strategies are similar - choose based on preference',
    });

    const badPayment = await fetch(`${baseUrl}/api/debt/payoff?monthlyPayment=-5`);
    expect(badPayment.status).toBe(400);
  });

  it('answers unknown API routes with 404', async () => {
    const response = await fetch(`${baseUrl}/api/advice`);
    expect(response.status).toBe(404);
  });
});
