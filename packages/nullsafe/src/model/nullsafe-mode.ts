/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeModeService, Severity } from '../services/modes.js';
import { assertUnreachable } from '../utils/utils.js';
import { ModelSpecifics } from './model-module.js';

export type NullsafeMode = DefaultMode | LocalMode | StrictMode;

/** Unannotated code is trusted, violations are reported as warnings only. */
export interface DefaultMode {
    readonly $mode: 'Default';
}
/** The checked code is nullsafe, but it might trust some of the unchecked code it uses. */
export interface LocalMode {
    readonly $mode: 'Local';
    readonly trust: TrustList;
}
/** The checked code and all the code it uses must be checked in strict mode. */
export interface StrictMode {
    readonly $mode: 'Strict';
}

/**
 * Which unchecked classes are trusted by code in local mode.
 * The trust list is an input of the nullability inference, which classifies values of trusted classes as `LocallyTrustedNonnull`.
 * The assignment rules only see the resulting nullabilities, they compare and print trust lists, but don't evaluate them.
 */
export type TrustList =
    | { readonly $trust: 'All' }
    | { readonly $trust: 'None' }
    | { readonly $trust: 'Only'; readonly classNames: readonly string[] };

export const DefaultMode: DefaultMode = { $mode: 'Default' };
export const StrictMode: StrictMode = { $mode: 'Strict' };
export function createLocalMode(trust: TrustList = { $trust: 'All' }): LocalMode {
    return { $mode: 'Local', trust };
}

export class DefaultNullsafeModes implements NullsafeModeService<ModelSpecifics> {

    areModesEqual(mode1: NullsafeMode, mode2: NullsafeMode): boolean {
        if (mode1.$mode === 'Local' && mode2.$mode === 'Local') {
            return this.areTrustListsEqual(mode1.trust, mode2.trust);
        }
        return mode1.$mode === mode2.$mode;
    }

    protected areTrustListsEqual(trust1: TrustList, trust2: TrustList): boolean {
        if (trust1.$trust === 'Only' && trust2.$trust === 'Only') {
            // the order of the trusted classes doesn't matter
            const names1 = new Set(trust1.classNames);
            const names2 = new Set(trust2.classNames);
            return names1.size === names2.size && [...names1].every(name => names2.has(name));
        }
        return trust1.$trust === trust2.$trust;
    }

    getDefaultMode(): NullsafeMode {
        return DefaultMode;
    }

    getSeverity(mode: NullsafeMode): Severity {
        switch (mode.$mode) {
            case 'Default':
                return 'warning';
            case 'Local':
            case 'Strict':
                return 'error';
            default:
                assertUnreachable(mode);
        }
    }

    printMode(mode: NullsafeMode): string {
        switch (mode.$mode) {
            case 'Default':
            case 'Strict':
                return mode.$mode;
            case 'Local':
                return mode.trust.$trust === 'Only' ? `Local(trust ${mode.trust.classNames.join(', ')})` : `Local(trust ${mode.trust.$trust})`;
            default:
                assertUnreachable(mode);
        }
    }
}
