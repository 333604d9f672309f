export { JobShopLibError, ValidationError, UninitializedAttributeError } from './core/errors';
export { Operation, type OperationSpec } from './core/operation';
export {
    JobShopInstance,
    type DurationMatrix,
    type InstanceMetadata,
    type InstanceOptions,
    type MachinesMatrix,
} from './core/job-shop-instance';
export { ScheduledOperation } from './core/scheduled-operation';
export { Schedule } from './core/schedule';
export { ConstraintChecker } from './core/constraint-checker';

export { Dispatcher, type DispatcherOptions, type ReadyOperationsFilter } from './dispatching/dispatcher';
export {
    DispatcherObserver,
    createOrGetObserver,
    type ObserverClass,
    type ObserverOptions,
} from './dispatching/dispatcher-observer';
export * from './dispatching/feature-observers/index';

export { Node, type NodePayload, type NodeType } from './graphs/node';
export { JobShopGraph, type Edge, type EdgeType, type JobShopGraphOptions } from './graphs/job-shop-graph';
export { buildDisjunctiveGraph, buildResourceTaskGraph } from './graphs/builders';
export { GraphUpdater, removeCompletedOperations } from './graphs/graph-updaters/graph-updater';
export {
    ResidualGraphUpdater,
    type ResidualGraphUpdaterOptions,
} from './graphs/graph-updaters/residual-graph-updater';

export { ReplayService } from './replay/replay.service';
export type { DispatchStep, InstanceDocument, ReplayResult, ScheduledOperationRecord } from './replay/types';
export { createLogger, getLogger } from './utils/logger';
export { loadConfig, safeLoadConfig, type Config } from './utils/config';
