/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { expect } from 'vitest';
import { NullsafeServices, NullsafeSpecifics } from '../nullsafe.js';
import { ContractViolationError, isContractViolationError } from '../services/analysis-units.js';
import { AssignmentContext } from '../services/assignment-context.js';
import { AssignmentAllowed, AssignmentCheckOptions, AssignmentViolation, isAssignmentAllowedResult, isAssignmentViolation } from '../services/assignment-checker.js';
import { IssueKind } from '../services/classification.js';
import { NullsafeDiagnostic } from '../services/diagnostics.js';

/** The inputs of a single check */
export interface CheckedAssignment<Specifics extends NullsafeSpecifics> {
    mode: Specifics['Mode'];
    target: Specifics['Nullability'];
    source: Specifics['Nullability'];
    options?: Partial<AssignmentCheckOptions>;
}

/**
 * Tests, that the given assignment is allowed.
 * @param services the services to use
 * @param assignment the assignment to check
 * @returns the successful result, containing the rules which allowed the assignment
 */
export function expectAssignmentAllowed<Specifics extends NullsafeSpecifics>(services: NullsafeServices<Specifics>, assignment: CheckedAssignment<Specifics>): AssignmentAllowed<Specifics> {
    const result = services.AssignmentChecker.getAssignmentResult(assignment.mode, assignment.target, assignment.source, assignment.options);
    if (isAssignmentAllowedResult<Specifics>(result)) {
        expect(services.AssignmentChecker.isAssignmentAllowed(assignment.mode, assignment.target, assignment.source, assignment.options)).toBe(true);
        expect(services.AssignmentChecker.getViolation(assignment.mode, assignment.target, assignment.source, assignment.options)).toBeUndefined();
        return result;
    }
    throw new Error(`Assigning ${print(services, assignment.source)} to ${print(services, assignment.target)} is not allowed in mode ${services.Modes.printMode(assignment.mode)}`);
}

/**
 * Tests, that the given assignment is not allowed.
 * @param services the services to use
 * @param assignment the assignment to check
 * @returns the found violation
 */
export function expectAssignmentViolation<Specifics extends NullsafeSpecifics>(services: NullsafeServices<Specifics>, assignment: CheckedAssignment<Specifics>): AssignmentViolation<Specifics> {
    const violation = services.AssignmentChecker.getViolation(assignment.mode, assignment.target, assignment.source, assignment.options);
    if (isAssignmentViolation<Specifics>(violation)) {
        expect(services.AssignmentChecker.isAssignmentAllowed(assignment.mode, assignment.target, assignment.source, assignment.options)).toBe(false);
        // violations carry exactly the inputs of the check
        expect(violation).toEqual({ $problem: AssignmentViolation, mode: assignment.mode, target: assignment.target, source: assignment.source });
        return violation;
    }
    throw new Error(`Assigning ${print(services, assignment.source)} to ${print(services, assignment.target)} is allowed in mode ${services.Modes.printMode(assignment.mode)}`);
}

/**
 * Checks the given assignment, which needs to be a violation, and tests the resulting diagnostic.
 * @param services the services to use
 * @param assignment the assignment to check
 * @param context where the assignment happens
 * @param location where the assignment happens in the source code
 * @param origin where the nullability of the assigned value comes from
 * @param expected the expected message and issue kind
 * @returns the diagnostic
 */
export function expectDiagnostic<Specifics extends NullsafeSpecifics>(
    services: NullsafeServices<Specifics>, assignment: CheckedAssignment<Specifics>,
    context: AssignmentContext<Specifics>, location: Specifics['Location'], origin: Specifics['Origin'],
    expected: { message: string; issueType: IssueKind },
): NullsafeDiagnostic<Specifics> {
    const violation = expectAssignmentViolation(services, assignment);
    const diagnostic = services.DiagnosticComposer.describe(violation, context, location, origin);
    expect(diagnostic.message).toBe(expected.message);
    expect(diagnostic.issueType).toBe(expected.issueType);
    expect(diagnostic.location).toBe(location);
    return diagnostic;
}

/**
 * Tests, that the given action breaks an invariant.
 * @param action the action to execute
 * @param expectedMessagePart a part of the expected error message
 * @returns the thrown error
 */
export function expectContractViolation(action: () => unknown, expectedMessagePart: string): ContractViolationError {
    try {
        action();
    } catch (error) {
        if (isContractViolationError(error)) {
            expect(error.message).toContain(expectedMessagePart);
            return error;
        }
        throw error;
    }
    throw new Error('The action was expected to break an invariant, but it finished normally.');
}

function print<Specifics extends NullsafeSpecifics>(services: NullsafeServices<Specifics>, nullability: Specifics['Nullability']): string {
    return services.Lattice.printNullability(nullability);
}
