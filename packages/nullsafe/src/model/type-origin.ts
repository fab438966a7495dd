/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeServices } from '../nullsafe.js';
import { OriginService } from '../services/origins.js';
import { MarkupFormatter, NamePrinter } from '../services/printing.js';
import { assertUnreachable } from '../utils/utils.js';
import { ModelSpecifics } from './model-module.js';
import { FieldName, ProcedureName } from './names.js';
import { SourceLocation } from './source-location.js';

/**
 * Where the nullability of a value comes from.
 * The dataflow analysis, which calculates the origins, is not part of this library.
 */
export type TypeOrigin =
    | NullConstOrigin
    | NonnullConstOrigin
    | FieldOrigin
    | MethodParameterOrigin
    | MethodCallOrigin
    | UndefOrigin;

/** the literal `null` */
export interface NullConstOrigin {
    readonly $origin: 'NullConst';
    readonly location: SourceLocation;
}
/** literals and `new` expressions */
export interface NonnullConstOrigin {
    readonly $origin: 'NonnullConst';
    readonly location: SourceLocation;
}
export interface FieldOrigin {
    readonly $origin: 'Field';
    readonly field: FieldName;
}
/** a parameter of the currently checked method */
export interface MethodParameterOrigin {
    readonly $origin: 'MethodParameter';
    readonly name: string;
}
/** the value returned by a call */
export interface MethodCallOrigin {
    readonly $origin: 'MethodCall';
    readonly procedure: ProcedureName;
    readonly location: SourceLocation;
}
/** the origin got lost, e.g. after joining different branches */
export interface UndefOrigin {
    readonly $origin: 'Undef';
}

export class ModelOrigins implements OriginService<ModelSpecifics> {
    protected readonly markup: MarkupFormatter;
    protected readonly printer: NamePrinter<ModelSpecifics>;

    constructor(services: NullsafeServices<ModelSpecifics>) {
        this.markup = services.rendering.Markup;
        this.printer = services.Printer;
    }

    getDescription(origin: TypeOrigin): string | undefined {
        switch (origin.$origin) {
            case 'NullConst':
                return `null constant at line ${origin.location.line}`;
            case 'Field':
                return `field ${this.markup.monospaced(this.printer.printField(origin.field))}`;
            case 'MethodParameter':
                return `method parameter ${this.markup.monospaced(origin.name)}`;
            case 'MethodCall':
                return `call to ${this.markup.monospaced(this.printer.printProcedure(origin.procedure, { withClass: true }))} at line ${origin.location.line}`;
            case 'NonnullConst':
            case 'Undef':
                return undefined;
            default:
                assertUnreachable(origin);
        }
    }

    isNullabilitySelfExplanatory(expression: string, origin: TypeOrigin): boolean {
        switch (origin.$origin) {
            case 'NullConst':
                return expression === 'null';
            case 'Field':
                // e.g. `name`, `this.name` or `person.name`
                return expression === origin.field.fieldName || expression.endsWith(`.${origin.field.fieldName}`);
            case 'MethodParameter':
                return expression === origin.name;
            case 'MethodCall':
                // e.g. `getName()` or `person.getName()`
                return getTrailingCallName(expression) === origin.procedure.methodName;
            case 'NonnullConst':
            case 'Undef':
                return false;
            default:
                assertUnreachable(origin);
        }
    }
}

/**
 * @param expression an expression as written in the source code
 * @returns the name of the called method, if the expression ends with a call, e.g. `b` for `a(x).b(c(y))`
 */
export function getTrailingCallName(expression: string): string | undefined {
    const trimmed = expression.trimEnd();
    if (trimmed.endsWith(')') === false) {
        return undefined;
    }
    let depth = 0;
    for (let index = trimmed.length - 1; index >= 0; index--) {
        const char = trimmed.charAt(index);
        if (char === ')') {
            depth++;
        } else if (char === '(') {
            depth--;
            if (depth === 0) {
                const match = /[A-Za-z_$][\w$]*$/.exec(trimmed.substring(0, index));
                return match?.[0];
            }
        }
    }
    return undefined; // unbalanced parentheses
}
