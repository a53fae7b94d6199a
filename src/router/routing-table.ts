import type { RoutingConfig } from '../config/schema.js';
import type { Backend, TaskType } from '../types.js';

export interface RoutingOptions {
  routing: RoutingConfig;
  /** Pins every task to one backend */
  forceBackend?: Backend;
}

export function preferredBackendFor(taskType: TaskType, options: RoutingOptions): Backend {
  if (options.forceBackend) {
    return options.forceBackend;
  }
  if (!options.routing.enabled) {
    return 'claude';
  }
  switch (taskType) {
    case 'plan':
    case 'plan-work':
      return options.routing.plan;
    case 'review':
      return options.routing.review;
    case 'security':
      return options.routing.security;
    default:
      return options.routing.build;
  }
}
