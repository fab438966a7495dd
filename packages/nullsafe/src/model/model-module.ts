/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { Module } from 'langium';
import { createNullsafeServices, NullsafeCollaboratorServices, NullsafeServices, NullsafeSpecifics, PartialNullsafeServices } from '../nullsafe.js';
import { createNullsafeConfiguration, NullsafeConfiguration } from '../services/configuration.js';
import { FieldName, ModelNamePrinter, ProcedureName } from './names.js';
import { DefaultNullabilityLattice, Nullability } from './nullability.js';
import { DefaultNullsafeModes, NullsafeMode } from './nullsafe-mode.js';
import { SourceLocation } from './source-location.js';
import { ModelModeSpecificMessages } from './special-messages.js';
import { ModelThirdPartySignatureLocator, ThirdPartySignatureRepository } from './third-party-repository.js';
import { ModelOrigins, TypeOrigin } from './type-origin.js';

/**
 * The default model for class-based languages with methods and fields.
 */
export interface ModelSpecifics extends NullsafeSpecifics {
    Nullability: Nullability;
    Mode: NullsafeMode;
    Origin: TypeOrigin;
    Location: SourceLocation;
    Procedure: ProcedureName;
    Field: FieldName;
}

export interface ModelOptions {
    configuration: Partial<NullsafeConfiguration>;
    thirdPartySignatures: ThirdPartySignatureRepository;
}

export function createModelCollaboratorsModule(): Module<NullsafeServices<ModelSpecifics>, NullsafeCollaboratorServices<ModelSpecifics>> {
    return {
        Lattice: () => new DefaultNullabilityLattice(),
        Modes: () => new DefaultNullsafeModes(),
        Origins: (services) => new ModelOrigins(services),
        Printer: () => new ModelNamePrinter(),
    };
}

/**
 * Replaces some of the generic implementations of the core services by implementations, which know the default model.
 */
export function createModelSpecificServicesModule(options?: Partial<ModelOptions>): Module<NullsafeServices<ModelSpecifics>, PartialNullsafeServices<ModelSpecifics>> {
    return {
        ThirdParty: () => new ModelThirdPartySignatureLocator(options?.thirdPartySignatures ?? { signatures: [] }),
        rendering: {
            SpecialMessages: (services) => new ModelModeSpecificMessages(services),
        },
        infrastructure: {
            Configuration: () => createNullsafeConfiguration(options?.configuration),
        },
    };
}

/**
 * Creates the services for the default model.
 * @param options the configuration and the already loaded third-party signatures
 * @param customization1 optional module with customizations
 * @param customization2 optional module with customizations
 * @returns the services with implementations for all services
 */
export function createNullsafeServicesForModel(
    options?: Partial<ModelOptions>,
    customization1?: Module<NullsafeServices<ModelSpecifics>, PartialNullsafeServices<ModelSpecifics>>,
    customization2?: Module<NullsafeServices<ModelSpecifics>, PartialNullsafeServices<ModelSpecifics>>,
): NullsafeServices<ModelSpecifics> {
    return createNullsafeServices(
        createModelCollaboratorsModule(),
        createModelSpecificServicesModule(options),
        customization1,
        customization2,
    );
}
