/**
 * ClientAssembler — OperationDescriptors → Resource Groups
 *
 * Groups bound operations by their resource/tag key, in order of first
 * appearance, and gives every group an attribute name on the aggregate
 * client and a class name. Within a group, a method name that is already
 * taken is suffixed `_2`, `_3`, … in document order.
 *
 * @module
 */
import { deduplicate, translate, type MemberStyle } from '../naming/NamingTranslator.js';
import type { OperationDescriptor } from '../binder/types.js';

// ── Types ────────────────────────────────────────────────

export interface ClientDescriptor {
    /** Group key as written in the document */
    readonly group: string;
    /** Attribute exposing this group on the aggregate client */
    readonly attribute: string;
    /** Name of the resource client class, e.g. `PetsClient` */
    readonly className: string;
    /** Tag description, when the document declares one */
    readonly description?: string;
    /** Final method name → operation, in document order */
    readonly methods: ReadonlyMap<string, OperationDescriptor>;
}

export interface AssembleOptions {
    readonly style?: MemberStyle;
    /** Tag name → description (from the document's `tags`) */
    readonly descriptions?: ReadonlyMap<string, string>;
    /** Names already taken in the target namespace (type names) */
    readonly takenNames?: ReadonlySet<string>;
}

// ── Assembler ────────────────────────────────────────────

/**
 * Assemble one {@link ClientDescriptor} per group.
 *
 * @returns Group key → descriptor, in order of first appearance
 */
export function assembleClients(
    operations: readonly OperationDescriptor[],
    options: AssembleOptions = {},
): Map<string, ClientDescriptor> {
    const grouped = new Map<string, Map<string, OperationDescriptor>>();

    for (const operation of operations) {
        let methods = grouped.get(operation.group);
        if (!methods) {
            methods = new Map();
            grouped.set(operation.group, methods);
        }
        methods.set(deduplicate(operation.name, new Set(methods.keys())), operation);
    }

    const attributes = new Set<string>();
    const classNames = new Set<string>(options.takenNames ?? []);
    const clients = new Map<string, ClientDescriptor>();

    for (const [group, methods] of grouped) {
        const attribute = deduplicate(translate(group, 'group', options.style), attributes);
        attributes.add(attribute);

        const className = deduplicate(`${translate(group, 'type')}Client`, classNames);
        classNames.add(className);

        const description = options.descriptions?.get(group);
        clients.set(group, Object.freeze({
            group,
            attribute,
            className,
            ...(description !== undefined ? { description } : {}),
            methods,
        }));
    }

    return clients;
}
