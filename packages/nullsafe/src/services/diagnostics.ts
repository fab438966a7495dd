/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeServices, NullsafeSpecifics } from '../nullsafe.js';
import { assertUnreachable } from '../utils/utils.js';
import { ContractViolationError } from './analysis-units.js';
import { AssigningToField, AssignmentContext, ModelSource, ParameterSignature, PassingParamToFunction, ReturningFromFunction } from './assignment-context.js';
import { AssignmentViolation } from './assignment-checker.js';
import { IssueKind, ViolationClassifier } from './classification.js';
import { NullsafeConfiguration } from './configuration.js';
import { NullabilityLattice } from './lattice.js';
import { Logger } from './logging.js';
import { NullsafeModeService } from './modes.js';
import { OriginService } from './origins.js';
import { MarkupFormatter, NamePrinter } from './printing.js';
import { ModeSpecificMessageProvider } from './special-messages.js';
import { ThirdPartySignatureLocator } from './third-party.js';

/** Everything the report pipeline needs to know about a violation. */
export interface NullsafeDiagnostic<Specifics extends NullsafeSpecifics> {
    readonly message: string;
    readonly issueType: IssueKind;
    readonly location: Specifics['Location'];
}

export interface DiagnosticComposer<Specifics extends NullsafeSpecifics> {
    /**
     * Explains a violation to users.
     * @param violation the result of a failed check
     * @param context where the assignment happens
     * @param location passed through into the diagnostic
     * @param origin where the nullability of the assigned value comes from
     * @throws ContractViolationError if the assigned nullability is impossible for the given context
     */
    describe(violation: AssignmentViolation<Specifics>, context: AssignmentContext<Specifics>, location: Specifics['Location'], origin: Specifics['Origin']): NullsafeDiagnostic<Specifics>;
}

export class DefaultDiagnosticComposer<Specifics extends NullsafeSpecifics> implements DiagnosticComposer<Specifics> {
    protected readonly lattice: NullabilityLattice<Specifics>;
    protected readonly modes: NullsafeModeService<Specifics>;
    protected readonly origins: OriginService<Specifics>;
    protected readonly thirdParty: ThirdPartySignatureLocator<Specifics>;
    protected readonly printer: NamePrinter<Specifics>;
    protected readonly markup: MarkupFormatter;
    protected readonly specialMessages: ModeSpecificMessageProvider<Specifics>;
    protected readonly classifier: ViolationClassifier<Specifics>;
    protected readonly configuration: NullsafeConfiguration;
    protected readonly logger: Logger;

    constructor(services: NullsafeServices<Specifics>) {
        this.lattice = services.Lattice;
        this.modes = services.Modes;
        this.origins = services.Origins;
        this.thirdParty = services.ThirdParty;
        this.printer = services.Printer;
        this.markup = services.rendering.Markup;
        this.specialMessages = services.rendering.SpecialMessages;
        this.classifier = services.ViolationClassifier;
        this.configuration = services.infrastructure.Configuration;
        this.logger = services.infrastructure.Logger;
    }

    describe(violation: AssignmentViolation<Specifics>, context: AssignmentContext<Specifics>, location: Specifics['Location'], origin: Specifics['Origin']): NullsafeDiagnostic<Specifics> {
        // mode-specific messages are used as they are, they are not mixed with the generic messages
        if (this.modes.areModesEqual(violation.mode, this.modes.getDefaultMode()) === false) {
            const special = this.specialMessages.getSpecialDiagnostic(violation.mode, violation.source, location, origin);
            if (special) {
                this.logger.debug(`Using the diagnostic of mode ${this.modes.printMode(violation.mode)}: ${special.message}`);
                return special;
            }
        }

        const evidence = this.shouldShowOrigin(context, origin) ? this.origins.getDescription(origin) : undefined;
        return {
            message: this.composeMessage(violation, context, evidence),
            issueType: this.classifier.getIssueKind(context),
            location,
        };
    }

    protected composeMessage(violation: AssignmentViolation<Specifics>, context: AssignmentContext<Specifics>, evidence: string | undefined): string {
        switch (context.$context) {
            case PassingParamToFunction:
                return this.describeBadParamPassed(context, violation.source, evidence);
            case AssigningToField:
                return `${this.markup.monospaced(this.printer.printField(context.field))} is declared non-nullable but is assigned ${this.describeAssignedValue(violation.source, '`null`', 'a nullable', context)}${this.printEvidenceSuffix(evidence)}.`;
            case ReturningFromFunction:
                return `${this.markup.monospaced(this.printer.printProcedure(context.procedure, { withClass: false }))}: return type is declared non-nullable but the method returns ${this.describeAssignedValue(violation.source, '`null`', 'a nullable value', context)}${this.printEvidenceSuffix(evidence)}.`;
            default:
                assertUnreachable(context);
        }
    }

    /**
     * The origin is not repeated, if the argument itself tells, where its nullability comes from.
     */
    protected shouldShowOrigin(context: AssignmentContext<Specifics>, origin: Specifics['Origin']): boolean {
        switch (context.$context) {
            case PassingParamToFunction:
                return this.origins.isNullabilitySelfExplanatory(context.actualParamExpression, origin) === false;
            case AssigningToField:
            case ReturningFromFunction:
                return true;
            default:
                assertUnreachable(context);
        }
    }

    protected describeBadParamPassed(context: PassingParamToFunction<Specifics>, paramNullability: Specifics['Nullability'], evidence: string | undefined): string {
        const argumentDescription = context.actualParamExpression === 'null'
            ? 'is `null`'
            : `${this.markup.monospaced(context.actualParamExpression)} is ${this.describeAssignedValue(paramNullability, '`null`', 'nullable', context)}`;
        const procedureName = this.markup.monospaced(this.printer.printProcedure(context.procedure, { withClass: true }));
        const paramName = this.printParamName(context.parameter);

        // already modelled procedures don't need another signature
        const suggestedSignatureFile = context.modelSource === undefined ? this.thirdParty.lookupRelatedSignatureFile(context.procedure) : undefined;
        if (suggestedSignatureFile !== undefined) {
            // Missing signatures of third-party code don't imply non-null parameters,
            // so the message doesn't claim that the parameter is declared as non-nullable.
            return `Third-party ${procedureName} is missing a signature that would allow passing a nullable to param #${context.paramPosition}${paramName}. `
                + `Actual argument ${argumentDescription}${this.printEvidenceSuffix(evidence)}. `
                + `Consider adding the correct signature of ${procedureName} to ${this.thirdParty.getUserFriendlySignatureFileName(suggestedSignatureFile)}.`;
        }
        return `${procedureName}: parameter #${context.paramPosition}${paramName} is declared non-nullable${this.printNonnullEvidence(context.modelSource)} `
            + `but the argument ${argumentDescription}${this.printEvidenceSuffix(evidence)}.`;
    }

    protected describeAssignedValue(nullability: Specifics['Nullability'], nullDescription: string, nullableDescription: string, context: AssignmentContext<Specifics>): string {
        if (this.lattice.isNull(nullability)) {
            return nullDescription;
        }
        if (this.lattice.isNullable(nullability)) {
            return nullableDescription;
        }
        throw new ContractViolationError(`Invariant violation while describing the violation of '${context.$context}': unexpected nullability ${this.lattice.printNullability(nullability)}`);
    }

    protected printNonnullEvidence(modelSource: ModelSource | undefined): string {
        if (modelSource === undefined) {
            return '';
        }
        switch (modelSource.$source) {
            case 'InternalModel':
                return ' (according to internal models)';
            case 'ThirdPartyRepo':
                return ` (see ${this.thirdParty.getUserFriendlySignatureFileName(modelSource.filename)} at line ${modelSource.lineNumber})`;
            default:
                assertUnreachable(modelSource);
        }
    }

    protected printParamName(parameter: ParameterSignature): string {
        if (parameter.name.includes(this.configuration.synthesizedParamNameMarker)) {
            // the real name is not available
            return '';
        }
        return `(${this.markup.monospaced(parameter.name)})`;
    }

    protected printEvidenceSuffix(evidence: string | undefined): string {
        return evidence !== undefined ? `: ${evidence}` : '';
    }
}
