/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

/**
 * Common interface of all problems which are produced by the checks of this library and rendered for users later.
 * Using a `$problem` discriminator instead of a closed union type enables adopters to introduce additional problems.
 */
export interface NullsafeProblem {
    readonly $problem: string;
}
export function isSpecificNullsafeProblem(problem: unknown, $problem: string): problem is NullsafeProblem {
    return typeof problem === 'object' && problem !== null && '$problem' in problem && problem.$problem === $problem;
}
