import { ValidationError } from '../../core/errors';
import type { Dispatcher } from '../dispatcher';
import { DurationObserver } from './duration-observer';
import { EarliestStartTimeObserver } from './earliest-start-time-observer';
import type { FeatureObserver, FeatureObserverOptions } from './feature-observer';
import { IsCompletedObserver } from './is-completed-observer';
import { IsReadyObserver } from './is-ready-observer';
import { IsScheduledObserver } from './is-scheduled-observer';
import { PositionInJobObserver } from './position-in-job-observer';
import { RemainingOperationsObserver } from './remaining-operations-observer';

export type FeatureObserverType =
    | 'is_ready'
    | 'earliest_start_time'
    | 'duration'
    | 'is_scheduled'
    | 'position_in_job'
    | 'remaining_operations'
    | 'is_completed';

type FeatureObserverClass = new (dispatcher: Dispatcher, options?: FeatureObserverOptions) => FeatureObserver;

const FEATURE_OBSERVERS: Record<FeatureObserverType, FeatureObserverClass> = {
    is_ready: IsReadyObserver,
    earliest_start_time: EarliestStartTimeObserver,
    duration: DurationObserver,
    is_scheduled: IsScheduledObserver,
    position_in_job: PositionInJobObserver,
    remaining_operations: RemainingOperationsObserver,
    is_completed: IsCompletedObserver,
};

export function isFeatureObserverType(value: string): value is FeatureObserverType {
    return Object.prototype.hasOwnProperty.call(FEATURE_OBSERVERS, value);
}

/**
 * Creates a feature observer from its type name, e.g. from a config file.
 * Throws a ValidationError for an unknown name.
 */
export function featureObserverFactory(
    type: FeatureObserverType | string,
    dispatcher: Dispatcher,
    options: FeatureObserverOptions = {},
): FeatureObserver {
    if (!isFeatureObserverType(type)) {
        throw new ValidationError(
            `Unknown feature observer type "${type}". Expected one of: ${Object.keys(FEATURE_OBSERVERS).join(', ')}.`,
        );
    }
    const ObserverClass = FEATURE_OBSERVERS[type];
    return new ObserverClass(dispatcher, options);
}
