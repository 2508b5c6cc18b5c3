/**
 * Navigator Factory
 *
 * Resolves configuration and creates window navigators.
 */

import { InvalidConfigError } from '../pagination/errors';
import type { JumpPhasePolicy } from '../pagination/phase-machine';
import type { PageMeasurer } from '../renderer/page-measurer';
import type { ChapterSource, WindowNavigatorConfig } from './navigator-interface';
import { WindowNavigator } from './window-navigator';

/**
 * Default navigator configuration
 */
export const DEFAULT_WINDOW_NAVIGATOR_CONFIG: WindowNavigatorConfig = {
  windowSize: 5,
  edgeMargin: 0, // shift only on entering an edge chapter
  fallbackPageCount: 1,
  maxLoadAttempts: 2, // one automatic retry
  jumpPhasePolicy: 'promote',
  debug: false,
};

const JUMP_PHASE_POLICIES: readonly JumpPhasePolicy[] = ['promote', 'await-entry'];

export interface CreateWindowNavigatorOptions<TContent> {
  config?: Partial<WindowNavigatorConfig>;
  /** Layout measurer used for page counts and repagination */
  measurer?: PageMeasurer<TContent>;
}

/**
 * Merge overrides into the defaults and validate the result
 */
export function resolveNavigatorConfig(overrides: Partial<WindowNavigatorConfig> = {}): WindowNavigatorConfig {
  const config: WindowNavigatorConfig = { ...DEFAULT_WINDOW_NAVIGATOR_CONFIG, ...overrides };

  assertInteger('windowSize', config.windowSize, 1);
  assertInteger('edgeMargin', config.edgeMargin, 0);
  assertInteger('fallbackPageCount', config.fallbackPageCount, 1);
  assertInteger('maxLoadAttempts', config.maxLoadAttempts, 1);

  if (!JUMP_PHASE_POLICIES.includes(config.jumpPhasePolicy)) {
    throw new InvalidConfigError(
      'jumpPhasePolicy',
      `expected one of ${JUMP_PHASE_POLICIES.join(', ')}, got ${String(config.jumpPhasePolicy)}`
    );
  }

  return config;
}

/**
 * Create a navigator over a chapter source
 *
 * @example
 * ```typescript
 * const navigator = createWindowNavigator(source, { config: { windowSize: 7 } });
 * await navigator.initialize(0);
 * ```
 */
export function createWindowNavigator<TContent = string>(
  source: ChapterSource<TContent>,
  options: CreateWindowNavigatorOptions<TContent> = {}
): WindowNavigator<TContent> {
  return new WindowNavigator(source, resolveNavigatorConfig(options.config), options.measurer);
}

function assertInteger(field: keyof WindowNavigatorConfig, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidConfigError(field, `expected an integer >= ${minimum}, got ${value}`);
  }
}
