/**
 * =============================================================================
 * ROUTING MODULE
 * =============================================================================
 *
 * Distance and duration between two resolved points via the routing service.
 * Request building is pure (buildRequest) and can be tested without I/O.
 * =============================================================================
 */

export * from './routing.service';
export * from './routing.schema';
