/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeSpecifics } from '../nullsafe.js';

export type Severity = 'error' | 'warning' | 'info' | 'hint';

/**
 * Checking modes are strictness levels.
 * Modes are only compared for equality, there is no order between them.
 */
export interface NullsafeModeService<Specifics extends NullsafeSpecifics> {
    areModesEqual(mode1: Specifics['Mode'], mode2: Specifics['Mode']): boolean;
    /** The default mode is the most lenient one, it is the only mode which might be optimistic regarding third-party code. */
    getDefaultMode(): Specifics['Mode'];
    /** The severity of all violations which are found in the given mode. */
    getSeverity(mode: Specifics['Mode']): Severity;
    printMode(mode: Specifics['Mode']): string;
}
