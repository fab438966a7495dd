/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeSpecifics } from '../nullsafe.js';

/**
 * The nullability lattice: a partially ordered set of nullability classifications.
 * It is not defined by the rules of this library, but consumed by them.
 * Implementations need to provide only a sub-type relationship and a mode-dependent notion of "non-null",
 * no total order is assumed.
 */
export interface NullabilityLattice<Specifics extends NullsafeSpecifics> {
    /**
     * Checks whether a value with the nullability `subtype` might be used where `supertype` is required.
     * The relationship is reflexive.
     */
    isSubtype(supertype: Specifics['Nullability'], subtype: Specifics['Nullability']): boolean;

    /**
     * Additional, mode-local relaxations, e.g. trusting values of legacy code as non-null.
     * @param mode the current checking mode
     * @param nullability the nullability of the assigned value
     * @returns true, if values with the given nullability are treated as non-null in the given mode
     */
    isConsideredNonnull(mode: Specifics['Mode'], nullability: Specifics['Nullability']): boolean;

    /** The value is `null` for sure. */
    isNull(nullability: Specifics['Nullability']): boolean;
    /** The value might be `null`. */
    isNullable(nullability: Specifics['Nullability']): boolean;
    /** The value is non-null according to a (possibly approximate) third-party declaration. */
    isThirdPartyNonnull(nullability: Specifics['Nullability']): boolean;

    /** Used for internal error messages and logging only, never for messages shown to users. */
    printNullability(nullability: Specifics['Nullability']): string;
}
