/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { ModelSource } from '../services/assignment-context.js';
import { ThirdPartySignatureLocator } from '../services/third-party.js';
import { ModelSpecifics } from './model-module.js';
import { getPackageName, ProcedureName } from './names.js';

/** A nullability signature of a single third-party method, as stored in a signature file */
export interface ThirdPartySignature {
    readonly filename: string;
    /** starts with 1 */
    readonly lineNumber: number;
    /** the package-qualified name of the class */
    readonly className: string;
    readonly methodName: string;
}

/**
 * The already loaded content of all signature files.
 */
export interface ThirdPartySignatureRepository {
    /** the directory which contains the signature files, used to show file names to users */
    readonly directory?: string;
    readonly signatures: readonly ThirdPartySignature[];
}

export class ModelThirdPartySignatureLocator implements ThirdPartySignatureLocator<ModelSpecifics> {
    protected readonly repository: ThirdPartySignatureRepository;

    constructor(repository: ThirdPartySignatureRepository) {
        this.repository = repository;
    }

    /**
     * A missing signature should be added to the file, which already contains signatures of the same class.
     * Otherwise the file, which is named after the longest package containing the class, is suggested,
     * e.g. `com.google.common.sig` for `com.google.common.base.Strings`.
     */
    lookupRelatedSignatureFile(procedure: ProcedureName): string | undefined {
        const sameClass = this.repository.signatures.find(signature => signature.className === procedure.className);
        if (sameClass) {
            return sameClass.filename;
        }
        const packageSegments = splitPackage(getPackageName(procedure.className));
        let bestFile: string | undefined = undefined;
        let bestLength = 0;
        for (const signature of this.repository.signatures) {
            const fileSegments = splitPackage(getPackageOfSignatureFile(signature.filename));
            if (fileSegments.length > bestLength && isPrefix(fileSegments, packageSegments)) {
                bestLength = fileSegments.length;
                bestFile = signature.filename;
            }
        }
        return bestFile;
    }

    getUserFriendlySignatureFileName(filename: string): string {
        const directory = this.repository.directory;
        if (directory === undefined || directory.length <= 0) {
            return filename;
        }
        return `${directory.replace(/\/+$/, '')}/${filename}`;
    }

    /**
     * Finds the signature of the given procedure, which is useful to build the contexts for checks.
     * @returns the source of the signature or `undefined`, if there is no signature for this procedure
     */
    getModelSource(procedure: ProcedureName): ModelSource | undefined {
        const signature = this.repository.signatures.find(s => s.className === procedure.className && s.methodName === procedure.methodName);
        if (signature) {
            return { $source: 'ThirdPartyRepo', filename: signature.filename, lineNumber: signature.lineNumber };
        }
        return undefined;
    }
}

function splitPackage(packageName: string): string[] {
    return packageName.length >= 1 ? packageName.split('.') : [];
}

/** Signature files are named after the package they cover, e.g. `com.google.common.sig`. */
export function getPackageOfSignatureFile(filename: string): string {
    const baseName = filename.substring(filename.lastIndexOf('/') + 1);
    const extension = baseName.lastIndexOf('.');
    return extension >= 0 ? baseName.substring(0, extension) : baseName;
}

function isPrefix(prefix: string[], segments: string[]): boolean {
    return prefix.length <= segments.length && prefix.every((segment, index) => segments[index] === segment);
}
