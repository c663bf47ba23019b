// src/core/runtime/ContextCapability.ts

import { Logger } from '../logging/Logger';
import { ErrorFactory } from '../errors';
import { CapabilityImplementation, GeneratedArtifact, wrappedTypeKey } from '../model';
import { Result, Stringifiable, err } from '../result';
import { ContextualFailure } from './ContextualFailure';

const MODULE = 'ContextCapability';

/** Class of a wrapped failure; matched through the prototype chain. */
export type FailureConstructor = abstract new (...args: never[]) => unknown;

/** For failure types that are not classes, e.g. tagged plain objects. */
export interface FailureGuard {
    readonly guard: (failure: unknown) => boolean;
}

export type FailureBinding = FailureConstructor | FailureGuard;

/** Runtime identity of every wrapped type, keyed by the declared type text. */
export type CapabilityBindings = Readonly<Record<string, FailureBinding>>;

/**
 * One conversion of the capability, bound to a single wrapped type.
 */
export interface Conversion {
    readonly wrappedType: string;
    readonly caseName: string;
    matches(failure: unknown): boolean;
    wrap(failure: unknown, context: Stringifiable): ContextualFailure;
    apply<T>(result: Result<T, unknown>, context: Stringifiable): Result<T, ContextualFailure>;
}

export interface BoundCapability {
    readonly name: string;
    readonly target: string;
    /**
     * Picks the conversion from the failure's runtime type. Success passes
     * through as the same object. Throws `DispatchError` when no conversion,
     * or more than one (class or guard), accepts the failure.
     */
    context<T>(result: Result<T, unknown>, context: Stringifiable): Result<T, ContextualFailure>;
    /** Same mapping for a rejected promise. */
    contextAsync<T>(promise: PromiseLike<T>, context: Stringifiable): Promise<T>;
    /** Explicit disambiguation by wrapped type. */
    via(wrappedType: string): Conversion;
    construct(caseName: string, failure: unknown, message: Stringifiable): ContextualFailure;
    conversions(): readonly Conversion[];
}

function isConstructor(binding: FailureBinding): binding is FailureConstructor {
    return typeof binding === 'function';
}

function prototypeOf(binding: FailureConstructor): object | null {
    const proto: unknown = binding.prototype;
    return typeof proto === 'object' && proto !== null ? proto : null;
}

class BoundConversion implements Conversion {
    public readonly wrappedType: string;
    public readonly caseName: string;

    constructor(private readonly impl: CapabilityImplementation, private readonly binding: FailureBinding) {
        this.wrappedType = impl.wrappedType;
        this.caseName = impl.caseName;
    }

    public matches(failure: unknown): boolean {
        if (isConstructor(this.binding)) {
            return failure instanceof this.binding;
        }
        return this.binding.guard(failure);
    }

    public wrap(failure: unknown, context: Stringifiable): ContextualFailure {
        return new ContextualFailure(this.impl.target, this.impl.caseName, failure, String(context), {
            source: this.impl.sourceSlot,
            message: this.impl.messageSlot,
        });
    }

    public apply<T>(result: Result<T, unknown>, context: Stringifiable): Result<T, ContextualFailure> {
        if (result.ok) {
            return result;
        }
        return err(this.wrap(result.error, context));
    }
}

class DispatchTable implements BoundCapability {
    private byWrappedType: Map<string, BoundConversion> = new Map();
    private byCase: Map<string, BoundConversion> = new Map();
    private byPrototype: Map<object, BoundConversion> = new Map();
    private guarded: BoundConversion[] = [];

    constructor(public readonly name: string, public readonly target: string) { }

    public add(conversion: BoundConversion, binding: FailureBinding): void {
        this.byWrappedType.set(wrappedTypeKey(conversion.wrappedType), conversion);
        this.byCase.set(conversion.caseName, conversion);

        if (!isConstructor(binding)) {
            this.guarded.push(conversion);
            return;
        }

        const proto = prototypeOf(binding);
        if (!proto) {
            throw ErrorFactory.binding(`Binding for ${conversion.wrappedType} has no prototype`, {
                scope: this.name,
                wrappedType: conversion.wrappedType,
            });
        }
        const taken = this.byPrototype.get(proto);
        if (taken) {
            throw ErrorFactory.binding(
                `${conversion.wrappedType} and ${taken.wrappedType} are bound to the same constructor`,
                { scope: this.name, wrappedType: conversion.wrappedType, cases: [taken.caseName, conversion.caseName] }
            );
        }
        this.byPrototype.set(proto, conversion);
    }

    private nearestByPrototype(failure: unknown): BoundConversion | undefined {
        if ((typeof failure === 'object' && failure !== null) || typeof failure === 'function') {
            let proto: unknown = Object.getPrototypeOf(failure);
            while (typeof proto === 'object' && proto !== null) {
                const conversion = this.byPrototype.get(proto);
                if (conversion) return conversion;
                proto = Object.getPrototypeOf(proto);
            }
        }
        return undefined;
    }

    /**
     * The nearest bound class and every accepting guard are all candidates;
     * anything but exactly one is a `DispatchError`.
     */
    private resolve(failure: unknown): BoundConversion {
        const byClass = this.nearestByPrototype(failure);
        const candidates = [
            ...(byClass ? [byClass] : []),
            ...this.guarded.filter(conversion => conversion.matches(failure)),
        ];
        const [only] = candidates;
        if (candidates.length === 1 && only) {
            return only;
        }

        const context = { scope: this.name, item: this.target, cases: candidates.map(c => c.caseName) };
        if (candidates.length > 1) {
            throw ErrorFactory.dispatch(
                `Failure matches ${candidates.length} conversions of ${this.name}: ${context.cases.join(', ')}`,
                failure,
                { ...context, suggestion: `pick one with ${this.name}.via(<wrapped type>)` }
            );
        }
        throw ErrorFactory.dispatch(`No conversion of ${this.name} accepts this failure`, failure, context);
    }

    public context<T>(result: Result<T, unknown>, context: Stringifiable): Result<T, ContextualFailure> {
        if (result.ok) {
            return result;
        }
        return err(this.resolve(result.error).wrap(result.error, context));
    }

    public async contextAsync<T>(promise: PromiseLike<T>, context: Stringifiable): Promise<T> {
        let value: T;
        try {
            value = await promise;
        } catch (failure) {
            throw this.resolve(failure).wrap(failure, context);
        }
        return value;
    }

    public via(wrappedType: string): Conversion {
        const conversion = this.byWrappedType.get(wrappedTypeKey(wrappedType));
        if (!conversion) {
            throw ErrorFactory.binding(`${this.name} has no conversion for ${wrappedType}`, {
                scope: this.name,
                wrappedType,
            });
        }
        return conversion;
    }

    public construct(caseName: string, failure: unknown, message: Stringifiable): ContextualFailure {
        const conversion = this.byCase.get(caseName);
        if (!conversion) {
            throw ErrorFactory.binding(`${this.target} has no contextual case ${caseName}`, {
                scope: this.name,
                item: this.target,
                caseName,
            });
        }
        return conversion.wrap(failure, message);
    }

    public conversions(): readonly Conversion[] {
        return Array.from(this.byWrappedType.values());
    }
}

/**
 * Builds the capability's dispatch table once. Every wrapped type of the
 * artifact needs a binding, and every binding must name a wrapped type.
 */
export function bindCapability(artifact: GeneratedArtifact, bindings: CapabilityBindings): BoundCapability {
    const { declaration, implementations } = artifact.capability;
    const table = new DispatchTable(declaration.name, declaration.target);

    const bindingsByKey = new Map<string, FailureBinding>();
    for (const [wrappedType, binding] of Object.entries(bindings)) {
        bindingsByKey.set(wrappedTypeKey(wrappedType), binding);
    }

    const known = new Set(implementations.map(impl => wrappedTypeKey(impl.wrappedType)));
    const unknown = Object.keys(bindings).filter(wrappedType => !known.has(wrappedTypeKey(wrappedType)));
    if (unknown.length > 0) {
        throw ErrorFactory.binding(`${declaration.name} does not wrap ${unknown.join(', ')}`, {
            scope: declaration.name,
            item: declaration.target,
            details: { unknown },
        });
    }

    for (const impl of implementations) {
        const binding = bindingsByKey.get(wrappedTypeKey(impl.wrappedType));
        if (!binding) {
            throw ErrorFactory.binding(`Missing binding for ${impl.wrappedType}`, {
                scope: declaration.name,
                item: declaration.target,
                caseName: impl.caseName,
                wrappedType: impl.wrappedType,
            });
        }
        table.add(new BoundConversion(impl, binding), binding);
    }

    Logger.debug(MODULE, `Bound ${implementations.length} conversion(s) for ${declaration.name}`, {
        target: declaration.target,
    });
    return table;
}
