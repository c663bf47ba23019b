// src/core/model/types.ts

/**
 * An attribute on an item, case or field, e.g. `{ name: 'display', value: 'not found: {0}' }`.
 * Values are opaque text; the generator never interprets display templates.
 */
export interface Attribute {
    readonly name: string;
    readonly value?: string;
}

/** A field of a case. Positional fields have no name. */
export interface Field {
    readonly name?: string;
    readonly type: string;
    readonly attributes: readonly Attribute[];
}

export type FieldStyle = 'unit' | 'positional' | 'named';

export type ItemShape = 'enum' | 'struct';

/**
 * One alternative of the error taxonomy: an enum variant, or the single
 * implicit case of a struct (named after the struct).
 */
/** A field exactly as the front end wrote it. */
export interface DeclaredField {
    readonly name?: string;
    readonly type: string;
    readonly attributes?: readonly Attribute[];
}

/**
 * A case exactly as the front end wrote it, minus the generator's marker.
 * Lists the front end left out stay absent.
 */
export interface DeclaredCase {
    readonly name: string;
    readonly fields?: readonly DeclaredField[];
    readonly attributes?: readonly Attribute[];
}

export interface Case {
    readonly name: string;
    readonly fields: readonly Field[];
    /** Attributes other than the generator's own marker */
    readonly attributes: readonly Attribute[];
    readonly contextual: boolean;
    /** Set on cases that are not marked contextual; emitted back unchanged */
    readonly declared?: DeclaredCase;
}

export interface TypeDefinition {
    readonly name: string;
    readonly shape: ItemShape;
    /** Item-level attributes; empty for structs, whose attributes belong to their case */
    readonly attributes: readonly Attribute[];
    readonly cases: readonly Case[];
    /** Resolved capability name: explicit override, else the configured default */
    readonly capabilityName: string;
}

export type CaseKind =
    | { readonly tag: 'contextual'; readonly wrappedType: string }
    | { readonly tag: 'opaque' };

export interface ClassifiedCase extends Case {
    readonly kind: CaseKind;
}

/**
 * Synthesizer output. Contextual cases carry `[wrapped field, message field]`
 * and a display template rendering the message; opaque cases are unchanged.
 */
export interface AugmentedCase extends ClassifiedCase {}

export interface AugmentedTypeDefinition {
    readonly name: string;
    readonly shape: ItemShape;
    readonly attributes: readonly Attribute[];
    readonly cases: readonly AugmentedCase[];
}

/** Index (positional) or name (named) of a field inside a case. */
export type FieldSlot = number | string;

export interface CapabilityDeclaration {
    readonly name: string;
    readonly method: string;
    readonly okTypeParameter: string;
    readonly contextParameter: string;
    readonly target: string;
}

export interface CapabilityImplementation {
    readonly capability: string;
    readonly wrappedType: string;
    readonly target: string;
    readonly caseName: string;
    readonly style: 'positional' | 'named';
    readonly sourceSlot: FieldSlot;
    readonly messageSlot: FieldSlot;
}

export interface EmittedCapability {
    readonly declaration: CapabilityDeclaration;
    readonly implementations: readonly CapabilityImplementation[];
}

export interface GeneratedArtifact {
    readonly definition: AugmentedTypeDefinition;
    readonly capability: EmittedCapability;
}
