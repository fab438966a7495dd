/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { inject, Module } from 'langium';
import { AnalysisUnits, DefaultAnalysisUnits } from './services/analysis-units.js';
import { AssignmentChecker, DefaultAssignmentChecker } from './services/assignment-checker.js';
import { DefaultViolationClassifier, ViolationClassifier } from './services/classification.js';
import { createNullsafeConfiguration, NullsafeConfiguration } from './services/configuration.js';
import { DefaultDiagnosticComposer, DiagnosticComposer } from './services/diagnostics.js';
import { NullabilityLattice } from './services/lattice.js';
import { Logger, NullLogger } from './services/logging.js';
import { NullsafeModeService } from './services/modes.js';
import { OriginService } from './services/origins.js';
import { DefaultMarkupFormatter, MarkupFormatter, NamePrinter } from './services/printing.js';
import { ModeSpecificMessageProvider, NoModeSpecificMessages } from './services/special-messages.js';
import { EmptyThirdPartySignatureLocator, ThirdPartySignatureLocator } from './services/third-party.js';
import { DeepPartial } from './utils/utils.js';

/**
 * Some design decisions:
 * - The rules don't define, how nullabilities are inferred or which nullabilities exist.
 *   The lattice, the modes, the origins and the names are given by collaborators, which need to be provided by adopters.
 * - All services are side-effect free and don't change after their creation, therefore checks might run in any order.
 * - Settings are not global, but a service of their own, i.e. different service instances might use different settings side-by-side.
 */

/**
 * The services which are implemented by this library, some of them might be customized.
 */
export type NullsafeCoreServices<Specifics extends NullsafeSpecifics> = {
    readonly AssignmentChecker: AssignmentChecker<Specifics>;
    readonly ViolationClassifier: ViolationClassifier<Specifics>;
    readonly DiagnosticComposer: DiagnosticComposer<Specifics>;
    readonly AnalysisUnits: AnalysisUnits;
    readonly ThirdParty: ThirdPartySignatureLocator<Specifics>;
    readonly rendering: {
        readonly Markup: MarkupFormatter;
        readonly SpecialMessages: ModeSpecificMessageProvider<Specifics>;
    };
    readonly infrastructure: {
        readonly Configuration: NullsafeConfiguration;
        readonly Logger: Logger;
    };
};

/**
 * The services which are consumed by this library, they need to be provided by adopters.
 */
export type NullsafeCollaboratorServices<Specifics extends NullsafeSpecifics> = {
    readonly Lattice: NullabilityLattice<Specifics>;
    readonly Modes: NullsafeModeService<Specifics>;
    readonly Origins: OriginService<Specifics>;
    readonly Printer: NamePrinter<Specifics>;
};

export type NullsafeServices<Specifics extends NullsafeSpecifics> = NullsafeCoreServices<Specifics> & NullsafeCollaboratorServices<Specifics>;

export function createDefaultNullsafeServicesModule<Specifics extends NullsafeSpecifics>(): Module<NullsafeServices<Specifics>, NullsafeCoreServices<Specifics>> {
    return {
        AssignmentChecker: (services) => new DefaultAssignmentChecker(services),
        ViolationClassifier: (services) => new DefaultViolationClassifier(services),
        DiagnosticComposer: (services) => new DefaultDiagnosticComposer(services),
        AnalysisUnits: (services) => new DefaultAnalysisUnits(services),
        ThirdParty: () => new EmptyThirdPartySignatureLocator(),
        rendering: {
            Markup: () => new DefaultMarkupFormatter(),
            SpecialMessages: () => new NoModeSpecificMessages(),
        },
        infrastructure: {
            Configuration: () => createNullsafeConfiguration(),
            Logger: () => new NullLogger(),
        },
    };
}

/**
 * Creates the services with the default implementations for all core services,
 * which might be exchanged by the given optional customized modules.
 * @param collaborators implementations for all consumed services
 * @param customization1 optional module with customizations
 * @param customization2 optional module with customizations
 * @param customization3 optional module with customizations
 * @returns the services with implementations for all services
 */
export function createNullsafeServices<Specifics extends NullsafeSpecifics>(
    collaborators: Module<NullsafeServices<Specifics>, NullsafeCollaboratorServices<Specifics>>,
    customization1?: Module<NullsafeServices<Specifics>, PartialNullsafeServices<Specifics>>,
    customization2?: Module<NullsafeServices<Specifics>, PartialNullsafeServices<Specifics>>,
    customization3?: Module<NullsafeServices<Specifics>, PartialNullsafeServices<Specifics>>,
): NullsafeServices<Specifics> {
    return inject(
        // use the default implementations for all core services
        createDefaultNullsafeServicesModule<Specifics>(),
        // the consumed services
        collaborators,
        // optionally add some more customization, e.g. for ...
        customization1, // ... production
        customization2, // ... testing (in order to replace some customizations of production)
        customization3, // ... single test cases
    );
}

/**
 * Services to be partially overridden via dependency injection.
 */
export type PartialNullsafeServices<Specifics extends NullsafeSpecifics> = DeepPartial<NullsafeServices<Specifics>>;

/**
 * This type collects all TypeScript types of the collaborators, which are consumed by the rules.
 */
export interface NullsafeSpecifics {
    /** The element type of the nullability lattice */
    Nullability: unknown;
    /** Checking modes, i.e. strictness levels */
    Mode: unknown;
    /** The evidence, why a value has its nullability */
    Origin: unknown;
    /** Locations in the source code, they are only passed through */
    Location: unknown;
    /** Identifies callees and functions which return values */
    Procedure: unknown;
    /** Identifies fields */
    Field: unknown;
}
