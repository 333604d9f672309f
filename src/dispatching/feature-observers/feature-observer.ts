import { ValidationError } from '../../core/errors';
import type { Dispatcher } from '../dispatcher';
import { DispatcherObserver, type ObserverOptions } from '../dispatcher-observer';
import { FeatureTable } from './feature-table';

export type FeatureType = 'operations' | 'machines' | 'jobs';

export const FEATURE_TYPES: readonly FeatureType[] = ['operations', 'machines', 'jobs'];

export interface FeatureObserverOptions extends ObserverOptions {
    /** Defaults to every type the observer supports. */
    featureTypes?: FeatureType | readonly FeatureType[];
}

/** Fixed per concrete class; passed up by each subclass constructor. */
export interface FeatureObserverShape {
    supportedFeatureTypes: readonly FeatureType[];
    /** Columns per table, for every type or per type. Defaults to 1. */
    featureSize?: number | Partial<Record<FeatureType, number>>;
}

/**
 * Base class for observers that keep one {@link FeatureTable} per tracked
 * feature type. Not singleton by default: one observer may track operations
 * while another instance of the same class tracks jobs.
 */
export abstract class FeatureObserver extends DispatcherObserver {
    readonly supportedFeatureTypes: readonly FeatureType[];
    readonly features: ReadonlyMap<FeatureType, FeatureTable>;

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions, shape: FeatureObserverShape) {
        super(dispatcher, options);
        this.supportedFeatureTypes = shape.supportedFeatureTypes;
        const featureTypes = this.resolveFeatureTypes(options.featureTypes);

        const { instance } = dispatcher;
        const entityCount: Record<FeatureType, number> = {
            operations: instance.numOperations,
            machines: instance.numMachines,
            jobs: instance.numJobs,
        };
        const features = new Map<FeatureType, FeatureTable>();
        for (const featureType of featureTypes) {
            const size =
                typeof shape.featureSize === 'number'
                    ? shape.featureSize
                    : (shape.featureSize?.[featureType] ?? 1);
            features.set(featureType, new FeatureTable(entityCount[featureType], size));
        }
        this.features = features;
    }

    get featureTypes(): FeatureType[] {
        return [...this.features.keys()];
    }

    hasFeatureType(featureType: FeatureType): boolean {
        return this.features.has(featureType);
    }

    /** The table for `featureType`. Throws when this observer does not track it. */
    getFeatures(featureType: FeatureType): FeatureTable {
        const table = this.features.get(featureType);
        if (table === undefined) {
            throw new ValidationError(`${this.kind} does not track ${featureType} features.`);
        }
        return table;
    }

    /**
     * Fills the tables from the dispatcher's current state. Tables are all
     * zeros when this runs.
     */
    protected abstract initializeFeatures(): void;

    initializeFromCurrentState(): void {
        this.setFeaturesToZero();
        this.initializeFeatures();
    }

    setFeaturesToZero(exclude: FeatureType | readonly FeatureType[] = []): void {
        const excluded = typeof exclude === 'string' ? [exclude] : exclude;
        for (const [featureType, table] of this.features) {
            if (!excluded.includes(featureType)) {
                table.fill(0);
            }
        }
    }

    toString(): string {
        const out = [`${this.kind}:`];
        for (const [featureType, table] of this.features) {
            out.push(`${featureType}: ${JSON.stringify(table.toArray())}`);
        }
        return out.join('\n');
    }

    private resolveFeatureTypes(featureTypes: FeatureType | readonly FeatureType[] | undefined): readonly FeatureType[] {
        if (featureTypes === undefined) {
            return this.supportedFeatureTypes;
        }
        const requested = typeof featureTypes === 'string' ? [featureTypes] : featureTypes;
        for (const featureType of requested) {
            if (!this.supportedFeatureTypes.includes(featureType)) {
                throw new ValidationError(`Feature type ${featureType} is not supported by ${this.constructor.name}.`);
            }
        }
        return requested;
    }
}
