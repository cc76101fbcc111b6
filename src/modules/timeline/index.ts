/**
 * Barrel exports for the timeline module.
 */

export { TimelineLog } from './timeline-log.js'
export type { Clock } from './timeline-log.js'
export type {
  TimelineEvent,
  TimelineEventInput,
  TimelineEventType,
  StatusTransition,
} from './types.js'
