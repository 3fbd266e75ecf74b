/**
 * Bootstrap: configuration sets and the state machine that collects them
 */

export type { ConfigurationSet } from './configuration-set.js';
export { createConfigurationSet } from './configuration-set.js';

export type { BootstrapAction } from './state-machine.js';
export { BootstrapState, BootstrapStateMachine } from './state-machine.js';
