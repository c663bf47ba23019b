// src/core/generator/ContextErrGenerator.ts

import { Logger } from '../logging/Logger';
import {
    DuplicateWrappedTypeError,
    InvalidContextualCaseError,
    InvalidOptionsError,
    MalformedItemError,
} from '../errors';
import { BuildOptions, GeneratedArtifact, buildTypeDefinition } from '../model';
import { classifyCases } from '../classification';
import { synthesizeCases } from '../synthesis';
import { CapabilityRegistry, emitCapability } from '../capability';
import { assembleArtifact } from '../output';
import { Result, err, ok } from '../result';

const MODULE = 'ContextErrGenerator';

export type GenerateOptions = BuildOptions;

/** Every way a generation can be rejected. */
export type GenerationFailure =
    | MalformedItemError
    | InvalidOptionsError
    | InvalidContextualCaseError
    | DuplicateWrappedTypeError;

function isGenerationFailure(error: unknown): error is GenerationFailure {
    return error instanceof MalformedItemError
        || error instanceof InvalidOptionsError
        || error instanceof InvalidContextualCaseError
        || error instanceof DuplicateWrappedTypeError;
}

function runPipeline(input: unknown, options: GenerateOptions): GeneratedArtifact {
    const definition = buildTypeDefinition(input, options);
    Logger.debug(MODULE, `Built ${definition.shape} ${definition.name}`, {
        cases: definition.cases.length,
        capability: definition.capabilityName,
    });

    const classified = classifyCases(definition);
    const augmented = synthesizeCases(classified);

    const registry = new CapabilityRegistry(definition.capabilityName, definition.name).registerAll(augmented);
    Logger.debug(MODULE, `Registered ${registry.size} wrapped type(s) in ${registry.scope}`, {
        wrappedTypes: registry.entries().map(entry => entry.wrappedType),
    });

    const capability = emitCapability(registry, definition.name);
    return assembleArtifact(definition, augmented, capability);
}

/**
 * Runs Build -> Classify -> Synthesize -> Register -> Emit -> Assemble.
 * A rejected item comes back as `err(...)` with nothing emitted; any other
 * exception propagates.
 */
export function generate(input: unknown, options: GenerateOptions = {}): Result<GeneratedArtifact, GenerationFailure> {
    try {
        return ok(runPipeline(input, options));
    } catch (error) {
        if (isGenerationFailure(error)) {
            Logger.warn(MODULE, error.toDiagnostic(), error.context);
            return err(error);
        }
        Logger.error(MODULE, 'Unexpected failure during generation', error);
        throw error;
    }
}

export function generateOrThrow(input: unknown, options: GenerateOptions = {}): GeneratedArtifact {
    const result = generate(input, options);
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}
