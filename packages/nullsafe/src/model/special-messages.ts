/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeServices } from '../nullsafe.js';
import { IssueKind } from '../services/classification.js';
import { NullsafeDiagnostic } from '../services/diagnostics.js';
import { NullabilityLattice } from '../services/lattice.js';
import { MarkupFormatter, NamePrinter } from '../services/printing.js';
import { ModeSpecificMessageProvider } from '../services/special-messages.js';
import { ThirdPartySignatureLocator } from '../services/third-party.js';
import { ModelSpecifics } from './model-module.js';
import { getSimpleClassName } from './names.js';
import { Nullability } from './nullability.js';
import { LocalMode, NullsafeMode, StrictMode } from './nullsafe-mode.js';
import { MethodCallOrigin, TypeOrigin } from './type-origin.js';
import { SourceLocation } from './source-location.js';

/**
 * In the local and the strict mode, values of calls to code which is not trusted in the current mode need to be checked for `null`.
 * Since these values are not nullable, the generic messages would be misleading.
 */
export class ModelModeSpecificMessages implements ModeSpecificMessageProvider<ModelSpecifics> {
    protected readonly lattice: NullabilityLattice<ModelSpecifics>;
    protected readonly printer: NamePrinter<ModelSpecifics>;
    protected readonly markup: MarkupFormatter;
    protected readonly thirdParty: ThirdPartySignatureLocator<ModelSpecifics>;

    constructor(services: NullsafeServices<ModelSpecifics>) {
        this.lattice = services.Lattice;
        this.printer = services.Printer;
        this.markup = services.rendering.Markup;
        this.thirdParty = services.ThirdParty;
    }

    getSpecialDiagnostic(mode: NullsafeMode, badNullability: Nullability, badUsageLocation: SourceLocation, origin: TypeOrigin): NullsafeDiagnostic<ModelSpecifics> | undefined {
        if (mode.$mode === 'Default' || origin.$origin !== 'MethodCall') {
            return undefined;
        }
        if (this.lattice.isNull(badNullability) || this.lattice.isNullable(badNullability) || this.lattice.isConsideredNonnull(mode, badNullability)) {
            // the generic messages fit
            return undefined;
        }
        if (badNullability === Nullability.ThirdPartyNonnull) {
            return {
                message: this.describeUnvettedThirdParty(mode, badUsageLocation, origin),
                issueType: IssueKind.UnvettedThirdPartyInNullsafe,
                location: badUsageLocation,
            };
        }
        return {
            message: this.describeUncheckedUsage(mode, badUsageLocation, origin),
            issueType: IssueKind.UncheckedUsageInNullsafe,
            location: badUsageLocation,
        };
    }

    protected describeUnvettedThirdParty(mode: LocalMode | StrictMode, badUsageLocation: SourceLocation, origin: MethodCallOrigin): string {
        const call = this.markup.monospaced(this.printer.printProcedure(origin.procedure, { withClass: true }));
        const signatureFile = this.thirdParty.lookupRelatedSignatureFile(origin.procedure);
        const whereToAdd = signatureFile !== undefined
            ? this.thirdParty.getUserFriendlySignatureFileName(signatureFile)
            : 'the third-party signatures';
        return `${call}: ${this.printModeName(mode)} prohibits using values coming from not vetted third-party methods without a check. `
            + `Result of this call is used at line ${badUsageLocation.line}. `
            + `Either add a local check for null or assertion, or add the correct signature to ${whereToAdd}.`;
    }

    protected describeUncheckedUsage(mode: LocalMode | StrictMode, badUsageLocation: SourceLocation, origin: MethodCallOrigin): string {
        const call = this.markup.monospaced(this.printer.printProcedure(origin.procedure, { withClass: true }));
        const className = this.markup.monospaced(getSimpleClassName(origin.procedure.className));
        const requiredMode = mode.$mode === 'Strict' ? 'strict' : 'nullsafe';
        return `${call}: ${this.printModeName(mode)} prohibits using values coming from non-${requiredMode} classes without a check. `
            + `Result of this call is used at line ${badUsageLocation.line}. `
            + `Either add a local check for null or assertion, or make ${className} ${requiredMode === 'strict' ? 'nullsafe strict' : 'nullsafe'}.`;
    }

    protected printModeName(mode: LocalMode | StrictMode): string {
        return mode.$mode === 'Strict' ? 'Strict mode' : 'Local mode';
    }
}
