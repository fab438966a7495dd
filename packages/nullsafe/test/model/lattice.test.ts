/******************************************************************************
 * Copyright 2025 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, expect, test } from 'vitest';
import { DefaultNullabilityLattice, Nullability } from '../../src/model/nullability.js';
import { createLocalMode, DefaultMode, NullsafeMode, StrictMode } from '../../src/model/nullsafe-mode.js';

describe('The default nullability lattice', () => {
    const lattice = new DefaultNullabilityLattice();

    test('sub-types are reflexive', () => {
        for (const nullability of Object.values(Nullability)) {
            expect(lattice.isSubtype(nullability, nullability)).toBe(true);
        }
    });

    test('sub-types are transitive', () => {
        expect(lattice.isSubtype(Nullability.Nullable, Nullability.StrictNonnull)).toBe(true);
        expect(lattice.isSubtype(Nullability.Nullable, Nullability.ThirdPartyNonnull)).toBe(true);
        expect(lattice.isSubtype(Nullability.UncheckedNonnull, Nullability.LocallyCheckedNonnull)).toBe(true);
    });

    test('super-types are no sub-types', () => {
        expect(lattice.isSubtype(Nullability.StrictNonnull, Nullability.Nullable)).toBe(false);
        expect(lattice.isSubtype(Nullability.ThirdPartyNonnull, Nullability.Null)).toBe(false);
        expect(lattice.isSubtype(Nullability.LocallyCheckedNonnull, Nullability.LocallyTrustedNonnull)).toBe(false);
    });

    test('null is not comparable with the non-null variants', () => {
        for (const nonnull of [Nullability.ThirdPartyNonnull, Nullability.UncheckedNonnull, Nullability.LocallyTrustedNonnull, Nullability.LocallyCheckedNonnull, Nullability.StrictNonnull]) {
            expect(lattice.isSubtype(Nullability.Null, nonnull)).toBe(false);
            expect(lattice.isSubtype(nonnull, Nullability.Null)).toBe(false);
            expect(lattice.isSubtype(Nullability.Nullable, nonnull)).toBe(true);
        }
    });

    test('cycles are rejected', () => {
        const customLattice = new DefaultNullabilityLattice();
        expect(() => customLattice.markAsSubtype(Nullability.Nullable, Nullability.Null)).toThrowError('Marking Nullable as sub-type of Null would introduce a cycle.');
        expect(() => customLattice.markAsSubtype(Nullability.Null, Nullability.Null)).toThrowError('Marking Null as sub-type of Null would introduce a cycle.');
    });

    test('values considered as non-null depend on the mode', () => {
        const consideredNonnull = (mode: NullsafeMode) =>
            Object.values(Nullability).filter(nullability => lattice.isConsideredNonnull(mode, nullability));
        expect(consideredNonnull(DefaultMode)).toEqual([
            Nullability.UncheckedNonnull, Nullability.LocallyTrustedNonnull, Nullability.LocallyCheckedNonnull, Nullability.StrictNonnull,
        ]);
        expect(consideredNonnull(createLocalMode())).toEqual([
            Nullability.LocallyTrustedNonnull, Nullability.LocallyCheckedNonnull, Nullability.StrictNonnull,
        ]);
        expect(consideredNonnull(StrictMode)).toEqual([Nullability.StrictNonnull]);
    });

    test('trust lists of the local mode are evaluated by the inference only', () => {
        for (const mode of [createLocalMode({ $trust: 'All' }), createLocalMode({ $trust: 'None' }), createLocalMode({ $trust: 'Only', classNames: ['com.example.model.Registry'] })]) {
            expect(lattice.isConsideredNonnull(mode, Nullability.LocallyTrustedNonnull)).toBe(true);
            expect(lattice.isConsideredNonnull(mode, Nullability.UncheckedNonnull)).toBe(false);
        }
    });

    test('predicates', () => {
        expect(lattice.isNull(Nullability.Null)).toBe(true);
        expect(lattice.isNull(Nullability.Nullable)).toBe(false);
        expect(lattice.isNullable(Nullability.Nullable)).toBe(true);
        expect(lattice.isThirdPartyNonnull(Nullability.ThirdPartyNonnull)).toBe(true);
        expect(lattice.isThirdPartyNonnull(Nullability.UncheckedNonnull)).toBe(false);
        expect(lattice.printNullability(Nullability.LocallyTrustedNonnull)).toBe('LocallyTrustedNonnull');
    });
});
