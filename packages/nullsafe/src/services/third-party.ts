/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeSpecifics } from '../nullsafe.js';

/**
 * Knows the externally maintained files with nullability signatures of third-party code.
 * The files themselves are loaded elsewhere, before any checks start.
 */
export interface ThirdPartySignatureLocator<Specifics extends NullsafeSpecifics> {
    /**
     * Suggests the signature file into which a missing signature of the given procedure should be added.
     * @param procedure the called third-party procedure
     * @returns the name of the signature file or `undefined`, if there is no suitable file
     */
    lookupRelatedSignatureFile(procedure: Specifics['Procedure']): string | undefined;

    /**
     * @param filename the name of a signature file as stored in the locator
     * @returns the name of the file as users should see it, e.g. prefixed by the directory of the signature repository
     */
    getUserFriendlySignatureFileName(filename: string): string;
}

/**
 * Used when no signatures of third-party code are available at all: Nothing is suggested.
 */
export class EmptyThirdPartySignatureLocator<Specifics extends NullsafeSpecifics> implements ThirdPartySignatureLocator<Specifics> {

    lookupRelatedSignatureFile(_procedure: Specifics['Procedure']): string | undefined {
        return undefined;
    }

    getUserFriendlySignatureFileName(filename: string): string {
        return filename;
    }
}
