declare const nodeIdBrand: unique symbol;

/**
 * Identity of a node in an arena. Issued by the arena only, strictly increasing, never reused.
 * Branded so that a plain number cannot stand in for one.
 */
export type NodeId = number & { readonly [nodeIdBrand]: true };

export function isNodeId(value: number): value is NodeId {
    return Number.isSafeInteger(value) && value >= 0;
}

export interface Identified {
    readonly id: NodeId;
}
