/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeServices, NullsafeSpecifics } from '../nullsafe.js';
import { assertUnreachable } from '../utils/utils.js';
import { AssigningToField, AssignmentContext, PassingParamToFunction, ReturningFromFunction } from './assignment-context.js';
import { AssignmentViolation } from './assignment-checker.js';
import { NullsafeModeService, Severity } from './modes.js';

/** Stable identifiers of the reported issues, e.g. for suppressions and statistics. */
export const IssueKind = {
    ParameterNotNullable: 'PARAMETER_NOT_NULLABLE',
    FieldNotNullable: 'FIELD_NOT_NULLABLE',
    ReturnNotNullable: 'RETURN_NOT_NULLABLE',
    // used by mode-specific diagnostics only
    UncheckedUsageInNullsafe: 'UNCHECKED_USAGE_IN_NULLSAFE',
    UnvettedThirdPartyInNullsafe: 'UNVETTED_THIRD_PARTY_IN_NULLSAFE',
} as const;
export type IssueKind = typeof IssueKind[keyof typeof IssueKind];

export interface ViolationClassifier<Specifics extends NullsafeSpecifics> {
    getIssueKind(context: AssignmentContext<Specifics>): IssueKind;
    getSeverity(violation: AssignmentViolation<Specifics>): Severity;
}

export class DefaultViolationClassifier<Specifics extends NullsafeSpecifics> implements ViolationClassifier<Specifics> {
    protected readonly modes: NullsafeModeService<Specifics>;

    constructor(services: NullsafeServices<Specifics>) {
        this.modes = services.Modes;
    }

    getIssueKind(context: AssignmentContext<Specifics>): IssueKind {
        switch (context.$context) {
            case PassingParamToFunction:
                return IssueKind.ParameterNotNullable;
            case AssigningToField:
                return IssueKind.FieldNotNullable;
            case ReturningFromFunction:
                return IssueKind.ReturnNotNullable;
            default:
                assertUnreachable(context);
        }
    }

    getSeverity(violation: AssignmentViolation<Specifics>): Severity {
        return this.modes.getSeverity(violation.mode);
    }
}
