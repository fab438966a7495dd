/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullabilityLattice } from '../services/lattice.js';
import { assertTrue, assertUnreachable } from '../utils/utils.js';
import { ModelSpecifics } from './model-module.js';
import { NullsafeMode } from './nullsafe-mode.js';

/**
 * The nullabilities of the default model.
 * The different non-null variants are distinguished by how the non-nullness was established.
 */
export const Nullability = {
    /** the only possible value is `null` */
    Null: 'Null',
    /** the value might be `null` */
    Nullable: 'Nullable',
    /** non-null according to a third-party signature or declaration, which might be approximate */
    ThirdPartyNonnull: 'ThirdPartyNonnull',
    /** non-null, since unchecked legacy code is not annotated as nullable */
    UncheckedNonnull: 'UncheckedNonnull',
    /** non-null, since it comes from code which is explicitly trusted by the current code */
    LocallyTrustedNonnull: 'LocallyTrustedNonnull',
    /** non-null according to code which is checked in the local mode */
    LocallyCheckedNonnull: 'LocallyCheckedNonnull',
    /** non-null according to code which is checked in the strict mode */
    StrictNonnull: 'StrictNonnull',
} as const;
export type Nullability = typeof Nullability[keyof typeof Nullability];

/**
 * Stores the direct sub-type relationships between nullabilities,
 * sub-type relationships are calculated transitively and reflexively.
 * Cycles are forbidden, since they would make different nullabilities equal.
 */
export class DefaultNullabilityLattice implements NullabilityLattice<ModelSpecifics> {
    /** sub-type => its direct super-types */
    protected readonly directSuperTypes: Map<Nullability, Set<Nullability>> = new Map();

    constructor() {
        // non-null variants which are established more strictly are usable everywhere, where less strict ones are expected
        this.markAsSubtype(Nullability.StrictNonnull, Nullability.LocallyCheckedNonnull);
        this.markAsSubtype(Nullability.LocallyCheckedNonnull, Nullability.LocallyTrustedNonnull);
        this.markAsSubtype(Nullability.LocallyTrustedNonnull, Nullability.UncheckedNonnull);
        this.markAsSubtype(Nullability.UncheckedNonnull, Nullability.ThirdPartyNonnull);
        // `null` and the non-null variants are not comparable, they meet in `Nullable` only
        this.markAsSubtype(Nullability.ThirdPartyNonnull, Nullability.Nullable);
        this.markAsSubtype(Nullability.Null, Nullability.Nullable);
    }

    markAsSubtype(subtype: Nullability, supertype: Nullability): void {
        assertTrue(this.isSubtype(subtype, supertype) === false, `Marking ${subtype} as sub-type of ${supertype} would introduce a cycle.`);
        let superTypes = this.directSuperTypes.get(subtype);
        if (superTypes === undefined) {
            superTypes = new Set();
            this.directSuperTypes.set(subtype, superTypes);
        }
        superTypes.add(supertype);
    }

    isSubtype(supertype: Nullability, subtype: Nullability): boolean {
        const visited: Set<Nullability> = new Set();
        const remainingToCheck: Nullability[] = [subtype];
        let current = remainingToCheck.pop();
        while (current !== undefined) {
            if (current === supertype) {
                return true;
            }
            if (visited.has(current) === false) {
                visited.add(current);
                remainingToCheck.push(...(this.directSuperTypes.get(current) ?? []));
            }
            current = remainingToCheck.pop();
        }
        return false;
    }

    isConsideredNonnull(mode: NullsafeMode, nullability: Nullability): boolean {
        if (this.isNull(nullability) || this.isNullable(nullability)) {
            return false;
        }
        return this.isSubtype(this.getLeastTrustedNonnull(mode), nullability);
    }

    /**
     * @param mode the current checking mode
     * @returns the weakest non-null variant, which is still treated as non-null in the given mode
     */
    protected getLeastTrustedNonnull(mode: NullsafeMode): Nullability {
        switch (mode.$mode) {
            case 'Default':
                return Nullability.UncheckedNonnull;
            case 'Local':
                return Nullability.LocallyTrustedNonnull;
            case 'Strict':
                return Nullability.StrictNonnull;
            default:
                assertUnreachable(mode);
        }
    }

    isNull(nullability: Nullability): boolean {
        return nullability === Nullability.Null;
    }

    isNullable(nullability: Nullability): boolean {
        return nullability === Nullability.Nullable;
    }

    isThirdPartyNonnull(nullability: Nullability): boolean {
        return nullability === Nullability.ThirdPartyNonnull;
    }

    printNullability(nullability: Nullability): string {
        return nullability;
    }
}
