import { WarningCollectorService } from './warning-collector.service.js';
import { TraceLoaderService } from '../trace/trace-loader.service.js';
import { createLongTaskTrace } from '../../test/fixtures/traces/index.js';
import type { RawTraceDocument } from '../shared/types/index.js';

describe('WarningCollectorService', () => {
  const loader = new TraceLoaderService();
  const collector = new WarningCollectorService();

  const load = (trace: RawTraceDocument) =>
    loader.load(JSON.stringify(trace));

  it('should report script tasks at or over the threshold', () => {
    const store = load(createLongTaskTrace({ taskCount: 3 }));

    expect(collector.collect(store)).toEqual([
      {
        code: 'LONG_TASKS',
        message: '3 script task(s) ran for 50ms or longer',
        count: 3,
      },
    ]);
  });

  it('should respect a custom long task threshold', () => {
    const store = load(createLongTaskTrace({ taskDurationMs: 80 }));

    expect(collector.collect(store, { longTaskThresholdMs: 100 })).toEqual([]);
    expect(
      collector.collect(store, { longTaskThresholdMs: 80 })[0]?.count,
    ).toBe(3);
  });

  it('should report layouts forced inside script tasks', () => {
    const store = load(
      createLongTaskTrace({
        taskCount: 2,
        taskDurationMs: 10,
        forceLayout: true,
      }),
    );

    expect(collector.collect(store)).toEqual([
      {
        code: 'FORCED_LAYOUTS',
        message: '2 layout(s) were forced synchronously by script',
        count: 2,
      },
    ]);
  });

  it('should not count a layout on another thread', () => {
    const store = load({
      traceEvents: [
        { pid: 1, tid: 1, ts: 0, ph: 'X', name: 'FunctionCall', dur: 5000 },
        { pid: 1, tid: 2, ts: 100, ph: 'X', name: 'Layout', dur: 200 },
        { pid: 1, tid: 1, ts: 4000, ph: 'X', name: 'Layout', dur: 2000 },
      ],
    });

    expect(collector.collect(store)).toEqual([]);
  });
});
