/**
 * Core pipeline: state, controller, relay and the wire protocol.
 */

export * from './collaborators.js';
export * from './request-state.js';
export * from './pipeline-state-machine.js';
export * from './pipeline-controller.js';
export * from './event-relay.js';
export * from './protocol/index.js';
