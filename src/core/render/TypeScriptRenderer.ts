// src/core/render/TypeScriptRenderer.ts

import { CONFIG } from '../../config/config';
import {
    Attribute,
    AugmentedCase,
    CapabilityDeclaration,
    CapabilityImplementation,
    Field,
    GeneratedArtifact,
} from '../model';

const INDENT = CONFIG.RENDER.INDENT;

function escapeComment(text: string): string {
    return text.replace(/\*\//g, '*\\/');
}

function tagOf(attr: Attribute): string {
    return attr.value === undefined ? `@${attr.name}` : `@${attr.name} ${escapeComment(attr.value)}`;
}

/**
 * Attributes become JSDoc tags so the display template and source marker
 * survive in the declaration text verbatim.
 */
function docComment(attributes: readonly Attribute[], indent: string): string[] {
    if (attributes.length === 0) return [];
    if (attributes.length === 1 && attributes[0]) {
        return [`${indent}/** ${tagOf(attributes[0])} */`];
    }
    return [
        `${indent}/**`,
        ...attributes.map(attr => `${indent} * ${tagOf(attr)}`),
        `${indent} */`,
    ];
}

function renderField(field: Field, index: number): string[] {
    const key = field.name ?? String(index);
    return [
        ...docComment(field.attributes, INDENT),
        `${INDENT}readonly ${key}: ${field.type};`,
    ];
}

function renderInterface(
    name: string,
    attributes: readonly Attribute[],
    discriminant: string | null,
    fields: readonly Field[]
): string[] {
    const body = [
        ...(discriminant === null ? [] : [`${INDENT}readonly ${CONFIG.RENDER.DISCRIMINANT}: '${discriminant}';`]),
        ...fields.flatMap(renderField),
    ];
    const header = `export interface ${name}`;
    return [
        ...docComment(attributes, ''),
        ...(body.length === 0 ? [`${header} {}`] : [`${header} {`, ...body, '}']),
    ];
}

function renderEnum(name: string, attributes: readonly Attribute[], cases: readonly AugmentedCase[]): string[] {
    const blocks = cases.map(c => renderInterface(`${name}${c.name}`, c.attributes, c.name, c.fields).join('\n'));
    const union = [
        ...docComment(attributes, ''),
        `export type ${name} = ${cases.map(c => `${name}${c.name}`).join(' | ')};`,
    ].join('\n');
    return [...blocks, union];
}

function renderCapability(declaration: CapabilityDeclaration, implementations: readonly CapabilityImplementation[]): string {
    const header = `export interface ${declaration.name}`;
    if (implementations.length === 0) {
        return `${header} {}`;
    }

    const { method, okTypeParameter: T, contextParameter, target } = declaration;
    const overloads = implementations.map(impl =>
        `${INDENT}${method}<${T}>(result: Result<${T}, ${impl.wrappedType}>, ${contextParameter}: Stringifiable): Result<${T}, ${target}>;`
    );
    return [`${header} {`, ...overloads, '}'].join('\n');
}

/**
 * Renders the artifact as TypeScript declarations: the target type (a
 * union discriminated on `kind` for enums, an interface for structs) and
 * the capability as one `context` overload per wrapped type.
 */
export function renderTypeScript(artifact: GeneratedArtifact): string {
    const { definition, capability } = artifact;
    const sole = definition.cases[0];

    const typeBlocks = definition.shape === 'struct' && sole
        ? [renderInterface(definition.name, sole.attributes, null, sole.fields).join('\n')]
        : renderEnum(definition.name, definition.attributes, definition.cases);

    const sections = [
        `// Generated by ${CONFIG.GENERATOR.NAME} ${CONFIG.GENERATOR.VERSION}. Do not edit.`,
        `import type { Result, Stringifiable } from '${CONFIG.RENDER.RUNTIME_MODULE}';`,
        ...typeBlocks,
        renderCapability(capability.declaration, capability.implementations),
    ];
    return sections.join('\n\n') + '\n';
}
