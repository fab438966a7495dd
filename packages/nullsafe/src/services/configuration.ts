/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

/**
 * Settings which are fixed for the whole lifetime of the services, i.e. they are set before any checking starts.
 */
export interface NullsafeConfiguration {
    /**
     * In the default mode, parameters of third-party procedures which are declared as non-null are treated optimistically,
     * i.e. nullable arguments are accepted, since third-party declarations might be approximate.
     */
    readonly optimisticThirdPartyParams: boolean;

    /**
     * Names of parameters, which contain this marker, were synthesized since the real names got lost.
     * Such names are not shown in messages.
     */
    readonly synthesizedParamNameMarker: string;
}

export const DefaultNullsafeConfiguration: NullsafeConfiguration = Object.freeze({
    optimisticThirdPartyParams: false,
    synthesizedParamNameMarker: '_arg_',
});

export function createNullsafeConfiguration(configuration?: Partial<NullsafeConfiguration>): NullsafeConfiguration {
    return Object.freeze({
        // the default values:
        ...DefaultNullsafeConfiguration,
        // the actually overriden values:
        ...configuration,
    });
}
