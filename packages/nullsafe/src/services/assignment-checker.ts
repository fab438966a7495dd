/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { NullsafeServices, NullsafeSpecifics } from '../nullsafe.js';
import { NullsafeProblem, isSpecificNullsafeProblem } from '../utils/utils-definitions.js';
import { NullsafeConfiguration } from './configuration.js';
import { NullabilityLattice } from './lattice.js';
import { Logger } from './logging.js';
import { NullsafeModeService } from './modes.js';

/**
 * The result of a failed check: The assigned value (`source`) is not allowed for the destination (`target`) in the given mode.
 * Violations are plain values, they are never thrown.
 */
export interface AssignmentViolation<Specifics extends NullsafeSpecifics> extends NullsafeProblem {
    readonly $problem: 'AssignmentViolation';
    readonly mode: Specifics['Mode'];
    readonly target: Specifics['Nullability'];
    readonly source: Specifics['Nullability'];
}
export const AssignmentViolation = 'AssignmentViolation';
export function isAssignmentViolation<Specifics extends NullsafeSpecifics>(problem: unknown): problem is AssignmentViolation<Specifics> {
    return isSpecificNullsafeProblem(problem, AssignmentViolation);
}

/**
 * The rules which might allow an assignment.
 * - `Subtype`: the nullability of the source is a sub-type of the nullability of the target
 * - `OptimisticThirdParty`: in the default mode, non-null parameters of third-party code are not trusted to be declared correctly
 * - `ConsideredNonnull`: the current mode treats the source as non-null anyway
 */
export type AssignmentGround = 'Subtype' | 'OptimisticThirdParty' | 'ConsideredNonnull';

export interface AssignmentAllowed<Specifics extends NullsafeSpecifics> {
    readonly $allowed: 'AssignmentAllowed';
    readonly mode: Specifics['Mode'];
    readonly target: Specifics['Nullability'];
    readonly source: Specifics['Nullability'];
    /** All rules which allow the assignment, never empty. The order has no meaning. */
    readonly grounds: AssignmentGround[];
}
export const AssignmentAllowed = 'AssignmentAllowed';
export function isAssignmentAllowedResult<Specifics extends NullsafeSpecifics>(result: unknown): result is AssignmentAllowed<Specifics> {
    return typeof result === 'object' && result !== null && '$allowed' in result && result.$allowed === AssignmentAllowed;
}

export type AssignmentCheckResult<Specifics extends NullsafeSpecifics> = AssignmentAllowed<Specifics> | AssignmentViolation<Specifics>;

export interface AssignmentCheckOptions {
    /** Overrides the value of the configuration for a single check. */
    optimisticThirdPartyParams: boolean;
}

/**
 * Decides, whether a value might be assigned to a destination regarding their nullabilities.
 * `target := source;`
 *
 * All methods are side-effect free (except of logging) and might be called in any order.
 */
export interface AssignmentChecker<Specifics extends NullsafeSpecifics> {
    isAssignmentAllowed(mode: Specifics['Mode'], target: Specifics['Nullability'], source: Specifics['Nullability'], options?: Partial<AssignmentCheckOptions>): boolean;
    /** @returns `undefined`, if the assignment is allowed */
    getViolation(mode: Specifics['Mode'], target: Specifics['Nullability'], source: Specifics['Nullability'], options?: Partial<AssignmentCheckOptions>): AssignmentViolation<Specifics> | undefined;
    getAssignmentResult(mode: Specifics['Mode'], target: Specifics['Nullability'], source: Specifics['Nullability'], options?: Partial<AssignmentCheckOptions>): AssignmentCheckResult<Specifics>;
}

/**
 * An assignment is allowed, if at least one of the rules in {@link AssignmentGround} holds.
 * All rules are evaluated, since they have no side effects and no priority among them is intended.
 */
export class DefaultAssignmentChecker<Specifics extends NullsafeSpecifics> implements AssignmentChecker<Specifics> {
    protected readonly lattice: NullabilityLattice<Specifics>;
    protected readonly modes: NullsafeModeService<Specifics>;
    protected readonly configuration: NullsafeConfiguration;
    protected readonly logger: Logger;

    constructor(services: NullsafeServices<Specifics>) {
        this.lattice = services.Lattice;
        this.modes = services.Modes;
        this.configuration = services.infrastructure.Configuration;
        this.logger = services.infrastructure.Logger;
    }

    isAssignmentAllowed(mode: Specifics['Mode'], target: Specifics['Nullability'], source: Specifics['Nullability'], options?: Partial<AssignmentCheckOptions>): boolean {
        return isAssignmentViolation(this.getViolation(mode, target, source, options)) === false;
    }

    getViolation(mode: Specifics['Mode'], target: Specifics['Nullability'], source: Specifics['Nullability'], options?: Partial<AssignmentCheckOptions>): AssignmentViolation<Specifics> | undefined {
        const result = this.getAssignmentResult(mode, target, source, options);
        return isAssignmentViolation<Specifics>(result) ? result : undefined;
    }

    getAssignmentResult(mode: Specifics['Mode'], target: Specifics['Nullability'], source: Specifics['Nullability'], options?: Partial<AssignmentCheckOptions>): AssignmentCheckResult<Specifics> {
        const actualOptions = this.collectOptions(options);
        const grounds: AssignmentGround[] = [];

        // 1. ordinary sub-type relationship
        if (this.lattice.isSubtype(target, source)) {
            grounds.push('Subtype');
        }
        // 2. relaxation for code which calls third-party code in the default mode
        if (this.fallsUnderOptimisticThirdParty(mode, target, actualOptions)) {
            grounds.push('OptimisticThirdParty');
        }
        // 3. mode-specific relaxations, e.g. trusting legacy code, as defined by the lattice
        if (this.lattice.isConsideredNonnull(mode, source)) {
            grounds.push('ConsideredNonnull');
        }

        if (grounds.length >= 1) {
            this.logger.debug(`Assigning ${this.lattice.printNullability(source)} to ${this.lattice.printNullability(target)} in mode ${this.modes.printMode(mode)} is allowed by ${grounds.join(', ')}.`);
            return {
                $allowed: AssignmentAllowed,
                mode,
                target,
                source,
                grounds,
            };
        }
        return {
            $problem: AssignmentViolation,
            mode,
            target,
            source,
        };
    }

    protected fallsUnderOptimisticThirdParty(mode: Specifics['Mode'], target: Specifics['Nullability'], options: AssignmentCheckOptions): boolean {
        return this.modes.areModesEqual(mode, this.modes.getDefaultMode())
            && options.optimisticThirdPartyParams
            && this.lattice.isThirdPartyNonnull(target);
    }

    protected collectOptions(options?: Partial<AssignmentCheckOptions>): AssignmentCheckOptions {
        return {
            optimisticThirdPartyParams: options?.optimisticThirdPartyParams ?? this.configuration.optimisticThirdPartyParams,
        };
    }
}
