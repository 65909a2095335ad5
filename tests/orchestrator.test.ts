import { describe, expect, it } from 'vitest';
import { Orchestrator } from '../src/execution/orchestrator';
import type { ArbState, SymbolRunner } from '../src/execution/state-machine';
import { PriceFeedCache } from '../src/crypto/price-cache';
import { SessionLedger } from '../src/crypto/persistence';
import { FatalError } from '../src/types/errors';
import { FakeClock, FakeReferenceStream, quietLogger } from './helpers/fakes';

// 2023-11-14 17:00:00 ET
const P = 1699999200;

class StubRunner implements SymbolRunner {
  state: ArbState = 'WaitingForOverlap';
  stopCalls = 0;

  constructor(
    readonly symbol: string,
    private readonly body: () => Promise<void>,
  ) {}

  run(): Promise<void> {
    return this.body();
  }

  stop(): void {
    this.stopCalls++;
    this.state = 'Stopped';
  }
}

function setup(runners: SymbolRunner[]) {
  const cache = new PriceFeedCache();
  const referenceStream = new FakeReferenceStream();
  const ledger = new SessionLedger();
  const clock = new FakeClock(P * 1000);
  const orchestrator = new Orchestrator({
    cache,
    referenceStream,
    runners,
    ledger,
    clock,
    warmupMs: 2000,
    log: quietLogger(),
  });
  return { cache, referenceStream, ledger, clock, orchestrator };
}

describe('Orchestrator', () => {
  it('keeps other symbols running when one fails', async () => {
    let ethFinished = false;
    const runners = [
      new StubRunner('btc', async () => {
        throw new FatalError('POLYMARKET_PRIVATE_KEY not set');
      }),
      new StubRunner('eth', async () => {
        await Promise.resolve();
        ethFinished = true;
      }),
    ];
    const { orchestrator, referenceStream } = setup(runners);

    const results = await orchestrator.run();

    expect(results).toEqual([
      { symbol: 'btc', status: 'failed', error: 'POLYMARKET_PRIVATE_KEY not set' },
      { symbol: 'eth', status: 'stopped' },
    ]);
    expect(ethFinished).toBe(true);
    expect(referenceStream.started).toBe(true);
    expect(referenceStream.stopped).toBe(true);
  });

  it('warms the reference feed up before starting the symbol loops', async () => {
    const startedAt: number[] = [];
    const clock = new FakeClock(P * 1000);
    const runner = new StubRunner('btc', async () => {
      startedAt.push(clock.now());
    });
    const orchestrator = new Orchestrator({
      cache: new PriceFeedCache(),
      referenceStream: new FakeReferenceStream(),
      runners: [runner],
      ledger: new SessionLedger(),
      clock,
      warmupMs: 2000,
      log: quietLogger(),
    });

    await orchestrator.run();

    expect(startedAt).toEqual([P * 1000 + 2000]);
  });

  it('routes reference ticks into the shared cache', async () => {
    let emit: (() => void) | null = null;
    const runner = new StubRunner('btc', async () => {
      if (emit) emit();
    });
    const { orchestrator, referenceStream, cache } = setup([runner]);
    emit = () => referenceStream.emit({ symbol: 'btc', timestamp_sec: P + 1, value: 97000 });

    await orchestrator.run();

    expect(cache.getReference('btc', 15, P)).toBe(97000);
    expect(cache.getReference('btc', 5, P)).toBe(97000);
  });

  it('reports each loop state and the cumulative PnL', () => {
    const runner = new StubRunner('btc', async () => undefined);
    runner.state = 'Trading';
    const { orchestrator } = setup([runner]);

    expect(orchestrator.status()).toEqual({
      running: false,
      started_at: null,
      symbols: [{ symbol: 'btc', state: 'Trading' }],
      cumulative_pnl: 0,
    });
  });

  it('stops every loop and the reference feed', () => {
    const runners = [new StubRunner('btc', async () => undefined), new StubRunner('eth', async () => undefined)];
    const { orchestrator, referenceStream } = setup(runners);

    orchestrator.stop();

    expect(runners.map(r => r.stopCalls)).toEqual([1, 1]);
    expect(referenceStream.stopped).toBe(true);
  });
});
