/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeSpecifics } from '../nullsafe.js';

/**
 * Provides the evidence why a value has its nullability ("origin" of the nullability).
 */
export interface OriginService<Specifics extends NullsafeSpecifics> {
    /**
     * @param origin the origin of the nullability of a value
     * @returns a description of the origin for users, e.g. "call to `getName()` at line 12", or `undefined`, if the origin is not worth to be shown
     */
    getDescription(origin: Specifics['Origin']): string | undefined;

    /**
     * Checks whether the textual expression already tells its readers, where its nullability comes from,
     * e.g. `this.nullableName` for a nullable field, so that the origin doesn't need to be repeated in messages.
     * @param expression the expression as written in the source code
     * @param origin the origin of the nullability of this expression
     */
    isNullabilitySelfExplanatory(expression: string, origin: Specifics['Origin']): boolean;
}
