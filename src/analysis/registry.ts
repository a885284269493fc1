import { comparator } from './comparator.js';
import { eventDetector } from './events.js';
import { scoringEngine } from './scoring.js';
import { strategyCalculator } from './strategy.js';
import type { StageRegistry } from './stage.js';

export const DEFAULT_STAGES: StageRegistry = {
  event_detection: eventDetector,
  scoring: scoringEngine,
  strategy_calc: strategyCalculator,
  comparison: comparator,
};
