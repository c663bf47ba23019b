// src/core/runtime/ContextualFailure.ts

import { FieldSlot } from '../model';

/**
 * A contextual case at run time: the original failure kept as causal
 * source, the context text as message. Slot values are also own read-only
 * properties, so a positional case reads as `failure[0]` / `failure[1]` and
 * a named one as `failure.<source>` / `failure.<message>`, matching the
 * rendered declarations. A slot whose name is already a property of the
 * failure (`kind`, `name`, `display`, ...) is reachable through `fields` only.
 */
export class ContextualFailure<TFailure = unknown> extends Error {
    readonly [slot: number]: unknown;

    public readonly target: string;
    /** Case name; doubles as the discriminant of the rendered union */
    public readonly kind: string;
    public readonly source: TFailure;
    /** Field values keyed by slot: `{ 0, 1 }` or `{ <source>, <message> }` */
    public readonly fields: Readonly<Record<string, unknown>>;

    constructor(
        target: string,
        caseName: string,
        source: TFailure,
        message: string,
        slots: { source: FieldSlot; message: FieldSlot } = { source: 0, message: 1 }
    ) {
        super(message, { cause: source });
        this.name = `${target}.${caseName}`;
        this.target = target;
        this.kind = caseName;
        this.source = source;
        this.fields = Object.freeze({
            [String(slots.source)]: source,
            [String(slots.message)]: message,
        });

        for (const [slot, value] of Object.entries(this.fields)) {
            if (!(slot in this)) {
                Object.defineProperty(this, slot, { value, enumerable: true, writable: false, configurable: false });
            }
        }
    }

    public get caseName(): string {
        return this.kind;
    }

    /** What the synthesized display template renders: the message, verbatim. */
    public display(): string {
        return this.message;
    }
}
