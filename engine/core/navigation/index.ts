/**
 * GridCalc Engine - Navigation Module Exports
 */

export {
  NavigationManager,
  createNavigationManager,
  nextWithin,
  clampToBounds,
  DEFAULT_NAVIGATION_CONFIG,
} from './NavigationManager.js';

export type {
  NavigationAction,
  NavigationConfig,
  NavigationResult,
  NavigationEvents,
} from './NavigationManager.js';
