/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NamePrinter, PrintProcedureOptions } from '../services/printing.js';
import { ModelSpecifics } from './model-module.js';

export interface ProcedureName {
    /** the package-qualified name of the class, e.g. `com.example.Person` */
    readonly className: string;
    readonly methodName: string;
    readonly parameterTypes: readonly string[];
}

export interface FieldName {
    /** the package-qualified name of the class, e.g. `com.example.Person` */
    readonly className: string;
    readonly fieldName: string;
}

export function createProcedureName(qualifiedMethodName: string, parameterTypes: readonly string[] = []): ProcedureName {
    const index = qualifiedMethodName.lastIndexOf('.');
    if (index < 0) {
        throw new Error(`'${qualifiedMethodName}' is not qualified by the name of its class.`);
    }
    return {
        className: qualifiedMethodName.substring(0, index),
        methodName: qualifiedMethodName.substring(index + 1),
        parameterTypes,
    };
}

export function getSimpleClassName(className: string): string {
    return className.substring(className.lastIndexOf('.') + 1);
}

/** @returns the empty string for classes in the default package */
export function getPackageName(className: string): string {
    const index = className.lastIndexOf('.');
    return index >= 0 ? className.substring(0, index) : '';
}

/**
 * Prints procedures in a simplified way: packages and parameter types are skipped,
 * `(...)` indicates, that there are parameters.
 */
export class ModelNamePrinter implements NamePrinter<ModelSpecifics> {

    printProcedure(procedure: ProcedureName, options?: Partial<PrintProcedureOptions>): string {
        const parameters = procedure.parameterTypes.length >= 1 ? '(...)' : '()';
        if (options?.withClass) {
            return `${getSimpleClassName(procedure.className)}.${procedure.methodName}${parameters}`;
        }
        return `${procedure.methodName}${parameters}`;
    }

    printField(field: FieldName): string {
        return field.fieldName;
    }
}
