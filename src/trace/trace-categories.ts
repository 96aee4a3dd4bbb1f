/**
 * Event name tables used to classify trace records
 */

import type { TraceCategory } from '../shared/types/index.js';

const RENDER_EVENTS = new Set([
  'BeginFrame',
  'BeginMainThreadFrame',
  'RequestMainThreadFrame',
  'ScheduleStyleRecalculation',
  'RecalculateStyles',
  'UpdateLayoutTree',
  'InvalidateLayout',
  'Layout',
  'UpdateLayerTree',
  'HitTest',
  'ParseHTML',
  'ParseAuthorStyleSheet',
]);

const SCRIPT_EVENTS = new Set([
  'FunctionCall',
  'EvaluateScript',
  'v8.compile',
  'v8.run',
  'v8.evaluateModule',
  'V8.Execute',
  'RunMicrotasks',
  'TimerFire',
  'EventDispatch',
  'XHRReadyStateChange',
  'FireAnimationFrame',
  'RequestAnimationFrame',
  'MajorGC',
  'MinorGC',
]);

const PAINT_EVENTS = new Set([
  'Paint',
  'PaintImage',
  'PaintSetup',
  'RasterTask',
  'Rasterize',
  'DecodeImage',
  'ResizeImage',
]);

const COMPOSITE_EVENTS = new Set([
  'CompositeLayers',
  'UpdateLayer',
  'DrawFrame',
  'ActivateLayerTree',
  'Commit',
  'Swap',
  'GPUTask',
  'UploadTexture',
]);

/**
 * Classify a record by name, falling back on its `cat` string.
 * Returns undefined when neither is recognised.
 */
export function classifyEvent(
  name: string,
  cat: string,
): TraceCategory | undefined {
  if (RENDER_EVENTS.has(name)) return 'render';
  if (SCRIPT_EVENTS.has(name)) return 'script';
  if (PAINT_EVENTS.has(name)) return 'paint';
  if (COMPOSITE_EVENTS.has(name)) return 'composite';

  // cat is a comma separated list, e.g. "devtools.timeline,v8"
  const categories = cat.split(',').map((c) => c.trim());
  if (categories.some((c) => c === 'v8' || c.startsWith('v8.'))) {
    return 'script';
  }
  if (categories.includes('gpu')) return 'composite';

  return undefined;
}
