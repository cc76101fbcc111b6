/**
 * Barrel exports for the incident-service module.
 */

export { IncidentServiceImpl, createIncidentService } from './incident-service-impl.js'
export type { CreateIncidentOptions, IncidentService, IncidentServiceOptions } from './incident-service.js'
