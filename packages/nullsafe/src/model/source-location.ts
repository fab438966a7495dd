/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

export interface SourceLocation {
    readonly file: string;
    /** starts with 1 */
    readonly line: number;
    readonly column?: number;
}
