import { boilerplateStrategy } from './boilerplateStrategy';
import { domStrategy } from './domStrategy';
import { readabilityStrategy } from './readabilityStrategy';
import type { ExtractionStrategy, StrategyName } from './strategy';

export { STRATEGY_NAMES, isStrategyName, type ExtractionStrategy, type StrategyName } from './strategy';

const REGISTRY: Record<StrategyName, ExtractionStrategy> = {
  boilerplate: boilerplateStrategy,
  readability: readabilityStrategy,
  dom: domStrategy,
};

/** Default race order. */
export const DEFAULT_STRATEGY_ORDER: readonly StrategyName[] = ['boilerplate', 'readability', 'dom'];

export function getStrategy(name: StrategyName): ExtractionStrategy {
  return REGISTRY[name];
}
