export { DuplicateDetector } from './detector.js';
export { DuplicateResolver } from './resolver.js';
export { msBetween, isSameUtcDay, formatDuration } from './date-diff.js';
export type { DedupCandidate, DuplicateMatch, DetectorConfig, AutoResolveOptions, SignalScore } from './types.js';
