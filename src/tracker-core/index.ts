// tracker-core: process lifecycle and grouping engine.
// Pure modules (identifiers, grouping, snapshot, state-machine, history) do
// no I/O; the engine reaches storage only through the ProcessStore port.

export * from './types';
export * from './errors';
export * from './department-config';
export * from './identifiers';
export * from './attributes';
export * from './assignees';
export * from './grouping';
export * from './snapshot';
export * from './state-machine';
export * from './history';
export * from './commands';
export * from './store';
export * from './engine';
