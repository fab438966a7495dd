/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeSpecifics } from '../nullsafe.js';
import { NullsafeDiagnostic } from './diagnostics.js';

/**
 * Non-default modes might explain violations in their own words and with their own issue kinds,
 * e.g. when a stricter mode doesn't trust values of legacy code.
 */
export interface ModeSpecificMessageProvider<Specifics extends NullsafeSpecifics> {
    /**
     * @param mode the current mode, never the default mode
     * @param badNullability the nullability of the assigned value
     * @param badUsageLocation where the value is assigned
     * @param origin where the nullability of the assigned value comes from
     * @returns a complete diagnostic which replaces the generic one, or `undefined` to use the generic diagnostic
     */
    getSpecialDiagnostic(mode: Specifics['Mode'], badNullability: Specifics['Nullability'], badUsageLocation: Specifics['Location'], origin: Specifics['Origin']): NullsafeDiagnostic<Specifics> | undefined;
}

export class NoModeSpecificMessages<Specifics extends NullsafeSpecifics> implements ModeSpecificMessageProvider<Specifics> {
    getSpecialDiagnostic(_mode: Specifics['Mode'], _badNullability: Specifics['Nullability'], _badUsageLocation: Specifics['Location'], _origin: Specifics['Origin']): NullsafeDiagnostic<Specifics> | undefined {
        return undefined;
    }
}
