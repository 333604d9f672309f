/**
 * Base class for every error the library throws on purpose.
 * Catch this to handle any library failure without listing each subclass.
 */
export class JobShopLibError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A precondition was violated: invalid instance data, an ineligible machine,
 * double scheduling, an infeasible start time, an unsupported feature type or
 * a duplicate singleton subscription.
 */
export class ValidationError extends JobShopLibError {}

/**
 * An accessor was used before the configuration or subscription it depends on.
 * Signals a usage-order bug, not bad data.
 */
export class UninitializedAttributeError extends JobShopLibError {}
