export { FeatureTable } from './feature-table';
export {
    FEATURE_TYPES,
    FeatureObserver,
    type FeatureObserverOptions,
    type FeatureObserverShape,
    type FeatureType,
} from './feature-observer';
export { EarliestStartTimeObserver } from './earliest-start-time-observer';
export { RemainingOperationsObserver } from './remaining-operations-observer';
export { IsCompletedObserver } from './is-completed-observer';
export { IsReadyObserver } from './is-ready-observer';
export { IsScheduledObserver } from './is-scheduled-observer';
export { DurationObserver } from './duration-observer';
export { PositionInJobObserver } from './position-in-job-observer';
export { CompositeFeatureObserver, type CompositeFeatureObserverOptions } from './composite-feature-observer';
export { featureObserverFactory, isFeatureObserverType, type FeatureObserverType } from './factory';
