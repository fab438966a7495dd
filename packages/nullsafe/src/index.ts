/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

export * from './nullsafe.js';
export * from './model/model-module.js';
export * from './model/names.js';
export * from './model/nullability.js';
export * from './model/nullsafe-mode.js';
export * from './model/source-location.js';
export * from './model/special-messages.js';
export * from './model/third-party-repository.js';
export * from './model/type-origin.js';
export * from './services/analysis-units.js';
export * from './services/assignment-checker.js';
export * from './services/assignment-context.js';
export * from './services/classification.js';
export * from './services/configuration.js';
export * from './services/diagnostics.js';
export * from './services/lattice.js';
export * from './services/logging.js';
export * from './services/modes.js';
export * from './services/origins.js';
export * from './services/printing.js';
export * from './services/special-messages.js';
export * from './services/third-party.js';
export * from './utils/utils.js';
export * from './utils/utils-definitions.js';
