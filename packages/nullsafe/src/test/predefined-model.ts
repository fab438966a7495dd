/******************************************************************************
 * Copyright 2025 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { Module } from 'langium';
import { createNullsafeServicesForModel, ModelOptions, ModelSpecifics } from '../model/model-module.js';
import { createProcedureName, FieldName, ProcedureName } from '../model/names.js';
import { SourceLocation } from '../model/source-location.js';
import { FieldOrigin, MethodCallOrigin, MethodParameterOrigin, NullConstOrigin, UndefOrigin } from '../model/type-origin.js';
import { NullsafeServices, PartialNullsafeServices } from '../nullsafe.js';
import { Logger } from '../services/logging.js';

/**
 * Collects all logged messages, in order to check them in test cases.
 */
export class TestLogger implements Logger {
    readonly messages: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string }> = [];

    debug(message: string): void {
        this.messages.push({ level: 'debug', message });
    }
    info(message: string): void {
        this.messages.push({ level: 'info', message });
    }
    warn(message: string): void {
        this.messages.push({ level: 'warn', message });
    }
    error(message: string): void {
        this.messages.push({ level: 'error', message });
    }

    getMessages(level: 'debug' | 'info' | 'warn' | 'error'): string[] {
        return this.messages.filter(m => m.level === level).map(m => m.message);
    }
}

/**
 * Creates services for the default model, dedicated for testing purposes.
 * @param options the configuration and the third-party signatures for the current test case
 * @param customizationForTesting specific customizations for the current test case
 * @returns the services with implementations
 */
export function createNullsafeServicesForTesting(
    options?: Partial<ModelOptions>,
    customizationForTesting: Module<NullsafeServices<ModelSpecifics>, PartialNullsafeServices<ModelSpecifics>> = {},
): NullsafeServices<ModelSpecifics> {
    return createNullsafeServicesForModel(
        options,
        {                                               // override some default implementations:
            infrastructure: {
                Logger: () => new TestLogger(),         // keep the logged messages for checks
            },
        },
        customizationForTesting,                        // specific customizations for the current test case
    );
}

// some predefined procedures
export const personSetName: ProcedureName = createProcedureName('com.example.model.Person.setName', ['java.lang.String']);
export const personGetName: ProcedureName = createProcedureName('com.example.model.Person.getName');
export const registryLookup: ProcedureName = createProcedureName('com.example.model.Registry.lookup', ['java.lang.String']);
export const joinerJoin: ProcedureName = createProcedureName('org.thirdparty.text.Joiner.join', ['java.lang.Iterable']);
export const splitterSplit: ProcedureName = createProcedureName('org.thirdparty.text.Splitter.split', ['java.lang.CharSequence']);
export const cacheGet: ProcedureName = createProcedureName('org.othervendor.cache.Cache.get', ['java.lang.Object']);

// some predefined fields
export const personName: FieldName = { className: 'com.example.model.Person', fieldName: 'name' };
export const personNickname: FieldName = { className: 'com.example.model.Person', fieldName: 'nickname' };

// some predefined locations
export const line3: SourceLocation = { file: 'src/com/example/model/Person.java', line: 3 };
export const line7: SourceLocation = { file: 'src/com/example/model/Person.java', line: 7 };
export const line12: SourceLocation = { file: 'src/com/example/model/Person.java', line: 12 };

// some predefined origins
export const nullConstAtLine3: NullConstOrigin = { $origin: 'NullConst', location: line3 };
export const fieldNickname: FieldOrigin = { $origin: 'Field', field: personNickname };
export const parameterAlias: MethodParameterOrigin = { $origin: 'MethodParameter', name: 'alias' };
export const callToLookupAtLine7: MethodCallOrigin = { $origin: 'MethodCall', procedure: registryLookup, location: line7 };
export const callToJoinAtLine7: MethodCallOrigin = { $origin: 'MethodCall', procedure: joinerJoin, location: line7 };
export const undefOrigin: UndefOrigin = { $origin: 'Undef' };

export function getTestLogger(services: NullsafeServices<ModelSpecifics>): TestLogger {
    const logger = services.infrastructure.Logger;
    if (logger instanceof TestLogger) {
        return logger;
    }
    throw new Error('The services are not created for testing.');
}
