/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeSpecifics } from '../nullsafe.js';

export interface PrintProcedureOptions {
    /** If selected, the name of the containing class is printed as well, e.g. `Person.setName(...)` instead of `setName(...)`. */
    withClass: boolean;
}

/**
 * Prints the identities of procedures and fields in a user-friendly way.
 * All services should use this printer, instead of printing procedures and fields on their own,
 * in order to customize the printing by overriding only this implementation.
 */
export interface NamePrinter<Specifics extends NullsafeSpecifics> {
    printProcedure(procedure: Specifics['Procedure'], options?: Partial<PrintProcedureOptions>): string;
    printField(field: Specifics['Field']): string;
}

/**
 * Marks up parts of messages, e.g. identifiers and expressions.
 */
export interface MarkupFormatter {
    /**
     * Renders the given text as code span.
     * @param text an identifier or expression
     * @returns the rendered text
     */
    monospaced(text: string): string;
}

/**
 * Code spans are rendered with backticks, as in Markdown.
 */
export class DefaultMarkupFormatter implements MarkupFormatter {

    monospaced(text: string): string {
        return `\`${text}\``;
    }
}

/**
 * Keeps code spans as they are, useful for consumers which don't render any markup, e.g. plain-text logs.
 */
export class PlainTextMarkupFormatter implements MarkupFormatter {

    monospaced(text: string): string {
        return text;
    }
}
