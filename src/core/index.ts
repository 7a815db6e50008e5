/**
 * Core Module Exports
 *
 * The context every step receives. Steps import BootstrapContext from here
 * (or '@/core/context') and never construct clients themselves.
 */

export type { BootstrapContext, ContextOptions } from './context';
export { createBootstrapContext } from './context';
