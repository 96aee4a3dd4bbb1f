import { Logger } from '@nestjs/common';
import { FrameExtractorService } from './frame-extractor.service.js';
import { TraceLoaderService } from '../trace/trace-loader.service.js';
import { createFrameTrace } from '../../test/fixtures/traces/index.js';
import type { RawTraceDocument } from '../shared/types/index.js';

describe('FrameExtractorService', () => {
  let extractor: FrameExtractorService;
  const loader = new TraceLoaderService();

  const load = (trace: RawTraceDocument) =>
    loader.load(JSON.stringify(trace));

  beforeEach(() => {
    extractor = new FrameExtractorService();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should turn boundary intervals into instantaneous FPS', () => {
    const store = load(createFrameTrace([0, 16666, 33333, 133333]));

    const { samples, boundaryCount, excludedIntervalCount } =
      extractor.extractFrameSamples(store);

    expect(boundaryCount).toBe(4);
    expect(excludedIntervalCount).toBe(0);
    expect(samples.map((s) => s.timestamp)).toEqual([16666, 33333, 133333]);
    expect(samples[0]?.instantaneousFps).toBeCloseTo(60, 1);
    expect(samples[1]?.instantaneousFps).toBeCloseTo(60, 1);
    expect(samples[2]?.instantaneousFps).toBe(10);
  });

  it('should return no samples for a trace without boundaries', () => {
    const result = extractor.extractFrameSamples(load({ traceEvents: [] }));

    expect(result.samples).toEqual([]);
    expect(result.boundaryCount).toBe(0);
  });

  it('should return no samples for a single boundary', () => {
    const result = extractor.extractFrameSamples(load(createFrameTrace([500])));

    expect(result.samples).toEqual([]);
    expect(result.boundaryCount).toBe(1);
  });

  it('should exclude and count zero-length intervals', () => {
    const store = load(createFrameTrace([0, 10000, 10000, 20000]));

    const result = extractor.extractFrameSamples(store);

    expect(result.samples.map((s) => s.instantaneousFps)).toEqual([100, 100]);
    expect(result.excludedIntervalCount).toBe(1);
    expect(result.samples.length).toBe(
      result.boundaryCount - 1 - result.excludedIntervalCount,
    );
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      'Excluded 1 frame interval(s) with a zero or negative duration',
    );
  });

  it('should only use markers from the requested thread', () => {
    const store = load(
      createFrameTrace([0, 20000, 40000], {
        extraEvents: [
          { pid: 1, tid: 7, ts: 10000, ph: 'I', name: 'DrawFrame' },
          { pid: 1, tid: 7, ts: 30000, ph: 'I', name: 'DrawFrame' },
        ],
      }),
    );

    expect(extractor.extractFrameSamples(store).samples).toHaveLength(4);

    const mainThread = extractor.extractFrameSamples(store, { threadId: 1 });
    expect(mainThread.samples.map((s) => s.instantaneousFps)).toEqual([
      50, 50,
    ]);
  });

  it('should keep markers from another process out of the stream', () => {
    const store = load(
      createFrameTrace([0, 20000, 40000], {
        extraEvents: [
          { pid: 2, tid: 1, ts: 10000, ph: 'I', name: 'DrawFrame' },
          { pid: 2, tid: 1, ts: 30000, ph: 'I', name: 'DrawFrame' },
        ],
      }),
    );

    const sameThreadId = extractor.extractFrameSamples(store, { threadId: 1 });
    expect(sameThreadId.samples.map((s) => s.instantaneousFps)).toEqual([
      100, 100, 100, 100,
    ]);

    const renderer = extractor.extractFrameSamples(store, {
      processId: 1,
      threadId: 1,
    });
    expect(renderer.samples.map((s) => s.instantaneousFps)).toEqual([50, 50]);
  });

  it('should honour custom frame markers', () => {
    const store = load({
      traceEvents: [
        { pid: 1, tid: 1, ts: 0, ph: 'I', name: 'BeginFrame' },
        { pid: 1, tid: 1, ts: 25000, ph: 'I', name: 'BeginFrame' },
        { pid: 1, tid: 1, ts: 5000, ph: 'I', name: 'DrawFrame' },
      ],
    });

    const result = extractor.extractFrameSamples(store, {
      frameMarkers: ['BeginFrame'],
    });

    expect(result.boundaryCount).toBe(2);
    expect(result.samples).toEqual([{ timestamp: 25000, instantaneousFps: 40 }]);
  });

  it('should return frozen samples', () => {
    const result = extractor.extractFrameSamples(
      load(createFrameTrace([0, 1000])),
    );

    expect(Object.isFrozen(result.samples)).toBe(true);
    expect(Object.isFrozen(result.samples[0])).toBe(true);
  });
});
