/******************************************************************************
 * Copyright 2025 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, expect, test } from 'vitest';
import { Nullability } from '../../src/model/nullability.js';
import { DefaultMode } from '../../src/model/nullsafe-mode.js';
import { ContractViolationError } from '../../src/services/analysis-units.js';
import { createNullsafeServicesForTesting, getTestLogger, line12, personGetName, undefOrigin } from '../../src/test/predefined-model.js';
import { expectAssignmentViolation } from '../../src/utils/test-utils.js';

describe('Analysis units', () => {

    test('completed unit', () => {
        const services = createNullsafeServicesForTesting();
        const outcome = services.AnalysisUnits.run('Person.getName', () => 42);
        expect(outcome).toEqual({ $outcome: 'Completed', unitName: 'Person.getName', value: 42 });
        expect(getTestLogger(services).getMessages('error')).toHaveLength(0);
    });

    test('a contract violation aborts only the current unit', () => {
        const services = createNullsafeServicesForTesting();
        const violation = expectAssignmentViolation(services, { mode: DefaultMode, target: Nullability.StrictNonnull, source: Nullability.ThirdPartyNonnull });

        const aborted = services.AnalysisUnits.run('Person.getName', () =>
            services.DiagnosticComposer.describe(violation, { $context: 'ReturningFromFunction', procedure: personGetName }, line12, undefOrigin));
        expect(aborted.$outcome).toBe('Aborted');
        if (aborted.$outcome === 'Aborted') {
            expect(aborted.unitName).toBe('Person.getName');
            expect(aborted.error).toBeInstanceOf(ContractViolationError);
            expect(aborted.error.name).toBe('ContractViolationError');
        }
        expect(getTestLogger(services).getMessages('error')).toEqual([
            "Internal error, the analysis of Person.getName is aborted: Invariant violation while describing the violation of 'ReturningFromFunction': unexpected nullability ThirdPartyNonnull",
        ]);

        // the next unit is analyzed as usual
        const next = services.AnalysisUnits.run('Person.setName', () => 'done');
        expect(next).toEqual({ $outcome: 'Completed', unitName: 'Person.setName', value: 'done' });
    });

    test('other errors are not caught', () => {
        const services = createNullsafeServicesForTesting();
        expect(() => services.AnalysisUnits.run('Person.getName', () => {
            throw new Error('unexpected failure');
        })).toThrow('unexpected failure');
        expect(getTestLogger(services).getMessages('error')).toHaveLength(0);
    });
});
