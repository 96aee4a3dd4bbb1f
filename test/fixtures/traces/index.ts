export {
  createFrameTrace,
  createSteadyFrameTrace,
  boundariesFromIntervals,
} from './frame-trace.fixture.js';
export { createLongTaskTrace } from './long-task.fixture.js';
