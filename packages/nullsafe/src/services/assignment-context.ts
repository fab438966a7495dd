/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeSpecifics } from '../nullsafe.js';

/** Describes where an assignment happens which is checked regarding nullability. */
export type AssignmentContext<Specifics extends NullsafeSpecifics> =
    | PassingParamToFunction<Specifics>
    | AssigningToField<Specifics>
    | ReturningFromFunction<Specifics>;

export interface ParameterSignature {
    /** The name of the parameter as declared, might be synthesized, if the real name is not available. */
    readonly name: string;
}

/** Where the nullability annotations of a called procedure come from. */
export type ModelSource = InternalModelSource | ThirdPartyRepoModelSource;

export interface InternalModelSource {
    readonly $source: 'InternalModel';
}
export interface ThirdPartyRepoModelSource {
    readonly $source: 'ThirdPartyRepo';
    readonly filename: string;
    readonly lineNumber: number;
}

export interface PassingParamToFunction<Specifics extends NullsafeSpecifics> {
    readonly $context: 'PassingParamToFunction';
    /** the called procedure */
    readonly procedure: Specifics['Procedure'];
    readonly parameter: ParameterSignature;
    /** starts with 1 */
    readonly paramPosition: number;
    /** the actual argument, as written in the source code */
    readonly actualParamExpression: string;
    /** `undefined` indicates, that the signature of the called procedure is neither modelled internally nor by a third-party signature */
    readonly modelSource?: ModelSource;
}
export const PassingParamToFunction = 'PassingParamToFunction';

export interface AssigningToField<Specifics extends NullsafeSpecifics> {
    readonly $context: 'AssigningToField';
    readonly field: Specifics['Field'];
}
export const AssigningToField = 'AssigningToField';

export interface ReturningFromFunction<Specifics extends NullsafeSpecifics> {
    readonly $context: 'ReturningFromFunction';
    /** the procedure which returns the value */
    readonly procedure: Specifics['Procedure'];
}
export const ReturningFromFunction = 'ReturningFromFunction';
