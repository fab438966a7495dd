/******************************************************************************
 * Copyright 2025 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { Module } from 'langium';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { Nullability } from '../../src/model/nullability.js';
import { DefaultMode } from '../../src/model/nullsafe-mode.js';
import { createNullsafeServices, NullsafeServices, NullsafeSpecifics, PartialNullsafeServices } from '../../src/nullsafe.js';
import { PassingParamToFunction } from '../../src/services/assignment-context.js';
import { IssueKind } from '../../src/services/classification.js';
import { DefaultNullsafeConfiguration } from '../../src/services/configuration.js';
import { ConsoleLogger, NullLogger } from '../../src/services/logging.js';
import { EmptyThirdPartySignatureLocator } from '../../src/services/third-party.js';
import { NoModeSpecificMessages } from '../../src/services/special-messages.js';
import { PlainTextMarkupFormatter } from '../../src/services/printing.js';
import { createNullsafeServicesForTesting, line12, personName, undefOrigin } from '../../src/test/predefined-model.js';
import { expectAssignmentAllowed, expectAssignmentViolation, expectDiagnostic } from '../../src/utils/test-utils.js';

/** A minimal model: three levels of certainty and three modes, everything is named by strings. */
type Certainty = 'sure' | 'null' | 'maybe';
type Strictness = 'lenient' | 'relaxed' | 'strict';
interface TinySpecifics extends NullsafeSpecifics {
    Nullability: Certainty;
    Mode: Strictness;
    Origin: string | undefined;
    Location: number;
    Procedure: string;
    Field: string;
}

// 'relaxed' is only another name of the default mode
const isLenient = (mode: Strictness) => mode === 'lenient' || mode === 'relaxed';

function createTinyServices(customization?: Module<NullsafeServices<TinySpecifics>, PartialNullsafeServices<TinySpecifics>>) {
    return createNullsafeServices<TinySpecifics>({
        Lattice: () => ({
            // 'sure' and 'null' are not comparable
            isSubtype: (supertype, subtype) => supertype === subtype || supertype === 'maybe',
            isConsideredNonnull: (mode, nullability) => mode === 'lenient' && nullability === 'sure',
            isNull: (nullability) => nullability === 'null',
            isNullable: (nullability) => nullability === 'maybe',
            isThirdPartyNonnull: () => false,
            printNullability: (nullability) => nullability,
        }),
        Modes: () => ({
            areModesEqual: (mode1, mode2) => mode1 === mode2 || (isLenient(mode1) && isLenient(mode2)),
            getDefaultMode: () => 'lenient',
            getSeverity: (mode) => mode === 'strict' ? 'error' : 'info',
            printMode: (mode) => mode,
        }),
        Origins: () => ({
            getDescription: (origin) => origin,
            isNullabilitySelfExplanatory: () => false,
        }),
        Printer: () => ({
            printProcedure: (procedure) => procedure,
            printField: (field) => field,
        }),
    }, customization);
}

describe('Customizing the services', () => {

    describe('Collaborators of a different model', () => {
        test('the default core services are used', () => {
            const services = createTinyServices();
            expect(services.ThirdParty).toBeInstanceOf(EmptyThirdPartySignatureLocator);
            expect(services.rendering.SpecialMessages).toBeInstanceOf(NoModeSpecificMessages);
            expect(services.infrastructure.Logger).toBeInstanceOf(NullLogger);
            expect(services.infrastructure.Configuration).toEqual(DefaultNullsafeConfiguration);
        });

        test('checks', () => {
            const services = createTinyServices();
            expectAssignmentAllowed(services, { mode: 'strict', target: 'maybe', source: 'null' });
            expectAssignmentViolation(services, { mode: 'strict', target: 'sure', source: 'maybe' });
            const violation = expectAssignmentViolation(services, { mode: 'lenient', target: 'sure', source: 'null' });
            expect(services.ViolationClassifier.getSeverity(violation)).toBe('info');
        });

        test('diagnostics', () => {
            const services = createTinyServices();
            const diagnostic = expectDiagnostic(services, { mode: 'strict', target: 'sure', source: 'maybe' },
                { $context: 'PassingParamToFunction', procedure: 'format', parameter: { name: 'value' }, paramPosition: 2, actualParamExpression: 'input' },
                17, 'the result of parse', {
                    message: '`format`: parameter #2(`value`) is declared non-nullable but the argument `input` is nullable: the result of parse.',
                    issueType: IssueKind.ParameterNotNullable,
                });
            expect(diagnostic.location).toBe(17);
        });

        test('the default mode is recognized by equality', () => {
            const services = createTinyServices({
                rendering: {
                    SpecialMessages: () => ({
                        getSpecialDiagnostic: (mode, _badNullability, location) => ({ message: `Not allowed in ${mode} mode.`, issueType: IssueKind.UncheckedUsageInNullsafe, location }),
                    }),
                },
            });
            const context: PassingParamToFunction<TinySpecifics> = {
                $context: PassingParamToFunction, procedure: 'format', parameter: { name: 'value' }, paramPosition: 2, actualParamExpression: 'input',
            };
            expectDiagnostic(services, { mode: 'relaxed', target: 'sure', source: 'maybe' }, context, 17, undefined, {
                message: '`format`: parameter #2(`value`) is declared non-nullable but the argument `input` is nullable.',
                issueType: IssueKind.ParameterNotNullable,
            });
            expectDiagnostic(services, { mode: 'strict', target: 'sure', source: 'maybe' }, context, 17, undefined, {
                message: 'Not allowed in strict mode.',
                issueType: IssueKind.UncheckedUsageInNullsafe,
            });
        });
    });

    test('plain text instead of markup', () => {
        const services = createNullsafeServicesForTesting(undefined, {
            rendering: {
                Markup: () => new PlainTextMarkupFormatter(),
            },
        });
        expectDiagnostic(services, { mode: DefaultMode, target: Nullability.StrictNonnull, source: Nullability.Nullable },
            { $context: 'AssigningToField', field: personName }, line12, undefOrigin, {
                message: 'name is declared non-nullable but is assigned a nullable.',
                issueType: IssueKind.FieldNotNullable,
            });
    });

    describe('Logging to the console', () => {
        afterEach(() => {
            vi.restoreAllMocks();
        });

        test('debug messages are written in verbose mode only', () => {
            const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
            const quiet = createNullsafeServicesForTesting(undefined, { infrastructure: { Logger: () => new ConsoleLogger() } });
            quiet.AssignmentChecker.getAssignmentResult(DefaultMode, Nullability.Nullable, Nullability.Null);
            expect(debug).not.toHaveBeenCalled();

            const verbose = createNullsafeServicesForTesting(undefined, { infrastructure: { Logger: () => new ConsoleLogger({ verbose: true }) } });
            verbose.AssignmentChecker.getAssignmentResult(DefaultMode, Nullability.Nullable, Nullability.Null);
            expect(debug).toHaveBeenCalledWith('[nullsafe] Assigning Null to Nullable in mode Default is allowed by Subtype.');
        });

        test('errors are written with a prefix', () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            new ConsoleLogger({ prefix: '[checker]' }).error('Something went wrong.');
            expect(error).toHaveBeenCalledWith('[checker] Something went wrong.');
        });
    });
});
