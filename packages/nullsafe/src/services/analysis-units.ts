/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeServices, NullsafeSpecifics } from '../nullsafe.js';
import { Logger } from './logging.js';

/**
 * Indicates a bug in the caller of this library or in the used lattice, not a defect in the checked code.
 * It is thrown, when an invariant is broken, e.g. when a non-null value reaches a renderer for nullable values.
 * Such errors must never be turned into messages for users.
 */
export class ContractViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContractViolationError';
    }
}
export function isContractViolationError(error: unknown): error is ContractViolationError {
    return error instanceof ContractViolationError;
}

export type AnalysisUnitOutcome<T> = AnalysisUnitCompleted<T> | AnalysisUnitAborted;

export interface AnalysisUnitCompleted<T> {
    readonly $outcome: 'Completed';
    readonly unitName: string;
    readonly value: T;
}

export interface AnalysisUnitAborted {
    readonly $outcome: 'Aborted';
    readonly unitName: string;
    readonly error: ContractViolationError;
}

/**
 * An analysis unit is e.g. a single procedure: when an internal error occurs during its analysis,
 * only the current unit is aborted, while other units are analyzed as usual.
 */
export interface AnalysisUnits {
    run<T>(unitName: string, action: () => T): AnalysisUnitOutcome<T>;
}

export class DefaultAnalysisUnits<Specifics extends NullsafeSpecifics> implements AnalysisUnits {
    protected readonly logger: Logger;

    constructor(services: NullsafeServices<Specifics>) {
        this.logger = services.infrastructure.Logger;
    }

    run<T>(unitName: string, action: () => T): AnalysisUnitOutcome<T> {
        try {
            const value = action();
            return { $outcome: 'Completed', unitName, value };
        } catch (error) {
            if (isContractViolationError(error)) {
                this.logger.error(`Internal error, the analysis of ${unitName} is aborted: ${error.message}`);
                return { $outcome: 'Aborted', unitName, error };
            }
            throw error;
        }
    }
}
