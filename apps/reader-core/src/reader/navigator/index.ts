/**
 * Navigator Module
 *
 * Exports for the chapter window navigator.
 */

// Types and interfaces
export type {
  ChapterPayload,
  ChapterSource,
  EvictionReason,
  NavigatorEvents,
  NavigatorEventListener,
  PageContentResult,
  WindowNavigatorConfig,
} from './navigator-interface';

// Helper functions
export { locationsEqual } from './navigator-interface';

// Factory
export {
  createWindowNavigator,
  resolveNavigatorConfig,
  DEFAULT_WINDOW_NAVIGATOR_CONFIG,
  type CreateWindowNavigatorOptions,
} from './navigator-factory';

// Navigator implementation
export { WindowNavigator, type ActiveWindowSnapshot } from './window-navigator';
