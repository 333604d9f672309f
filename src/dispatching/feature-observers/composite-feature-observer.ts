import { ValidationError } from '../../core/errors';
import type { Dispatcher } from '../dispatcher';
import type { ObserverOptions } from '../dispatcher-observer';
import { FEATURE_TYPES, FeatureObserver, type FeatureType } from './feature-observer';

export interface CompositeFeatureObserverOptions extends ObserverOptions {
    /** Defaults to every feature observer subscribed when this one is built. */
    featureObservers?: readonly FeatureObserver[];
}

/**
 * Concatenates, per feature type, the columns of several feature observers.
 * Must be notified after them, so subscribe it last.
 */
export class CompositeFeatureObserver extends FeatureObserver {
    readonly kind = 'composite';
    readonly featureObservers: readonly FeatureObserver[];

    constructor(dispatcher: Dispatcher, options: CompositeFeatureObserverOptions = {}) {
        const observers = options.featureObservers ?? subscribedFeatureObservers(dispatcher);
        for (const observer of observers) {
            if (observer.dispatcher !== dispatcher) {
                throw new ValidationError(`Observer ${observer.kind} belongs to a different dispatcher.`);
            }
        }
        const featureSize = columnCounts(observers);
        super(
            dispatcher,
            { ...options, featureTypes: FEATURE_TYPES.filter((featureType) => featureSize[featureType] > 0) },
            { supportedFeatureTypes: FEATURE_TYPES, featureSize },
        );
        this.featureObservers = observers;
        this.activate(options.subscribe);
    }

    /** Kind of the observer each column was copied from. */
    columnLabels(featureType: FeatureType): string[] {
        const labels: string[] = [];
        for (const observer of this.featureObservers) {
            const table = observer.features.get(featureType);
            for (let column = 0; column < (table?.columns ?? 0); column++) {
                labels.push(observer.kind);
            }
        }
        return labels;
    }

    protected initializeFeatures(): void {
        for (const [featureType, table] of this.features) {
            let offset = 0;
            for (const observer of this.featureObservers) {
                const source = observer.features.get(featureType);
                if (!source) {
                    continue;
                }
                for (let row = 0; row < source.rows; row++) {
                    for (let column = 0; column < source.columns; column++) {
                        table.set(row, source.get(row, column), offset + column);
                    }
                }
                offset += source.columns;
            }
        }
    }

    update(): void {
        this.initializeFeatures();
    }
}

function subscribedFeatureObservers(dispatcher: Dispatcher): FeatureObserver[] {
    return dispatcher.subscribers.filter(
        (observer): observer is FeatureObserver =>
            observer instanceof FeatureObserver && !(observer instanceof CompositeFeatureObserver),
    );
}

function columnCounts(observers: readonly FeatureObserver[]): Record<FeatureType, number> {
    const counts: Record<FeatureType, number> = { operations: 0, machines: 0, jobs: 0 };
    for (const observer of observers) {
        for (const [featureType, table] of observer.features) {
            counts[featureType] += table.columns;
        }
    }
    return counts;
}
