import type { EngineMode } from '../types.js';

import { quoteArgument } from '../utils.js';

export type PropertyKind = 'ltl' | 'ltl_ic3' | 'invar_ic3' | 'bmc';

export const PROPERTY_KINDS: readonly PropertyKind[] = ['ltl', 'ltl_ic3', 'invar_ic3', 'bmc'];

export interface PropertyCommandOptions {
  bound?: number;
  property?: string;
}

interface PropertyCommandShape {
  command: string;
  mode: EngineMode;
  propertyFlag: '-p' | '-L';
  boundRequired: boolean;
}

const PROPERTY_COMMANDS: Record<PropertyKind, PropertyCommandShape> = {
  ltl: { command: 'check_ltlspec', mode: 'bdd', propertyFlag: '-p', boundRequired: false },
  ltl_ic3: { command: 'check_ltlspec_ic3', mode: 'symbolic', propertyFlag: '-p', boundRequired: false },
  invar_ic3: { command: 'check_property_as_invar_ic3', mode: 'symbolic', propertyFlag: '-L', boundRequired: false },
  bmc: { command: 'msat_check_ltlspec_bmc', mode: 'symbolic', propertyFlag: '-p', boundRequired: true },
};

export const isPropertyKind = (value: unknown): value is PropertyKind => (
  typeof value === 'string' && PROPERTY_KINDS.some((kind) => kind === value)
);

export const propertyMode = (kind: PropertyKind): EngineMode => PROPERTY_COMMANDS[kind].mode;

const joinParts = (parts: readonly (string | undefined)[]): string => (
  parts.filter((part): part is string => part !== undefined && part.length > 0).join(' ')
);

/**
 * Command line for a property check. Without a property the engine checks every
 * property of the matching kind declared in the model.
 */
export function propertyCommand(kind: PropertyKind, opts: PropertyCommandOptions = {}): string {
  const shape = PROPERTY_COMMANDS[kind];
  const { bound, property } = opts;
  if (bound !== undefined && (!Number.isInteger(bound) || bound < 0)) {
    throw new RangeError(`bound must be a non-negative integer, got ${String(bound)}`);
  }
  if (shape.boundRequired && bound === undefined) {
    throw new RangeError(`${shape.command} needs a bound`);
  }
  // A zero bound means "engine default" except where the bound is mandatory.
  const boundPart = bound !== undefined && (bound > 0 || shape.boundRequired) ? `-k ${String(bound)}` : undefined;
  const propertyPart = property !== undefined && property.length > 0
    ? `${shape.propertyFlag} ${quoteArgument(property)}`
    : undefined;
  return joinParts([shape.command, boundPart, propertyPart]);
}

export const pickStateCommand = (constraint: string): string => (
  `msat_pick_state -c ${quoteArgument(constraint)} -v -i`
);

export const simulateStepCommand = (constraint: string): string => (
  `msat_simulate -i -a -k 1 -c ${quoteArgument(constraint)}`
);

export const setVariableCommand = (name: string, value: string | null): string => (
  value === null ? `unset ${name}` : `set ${name} ${quoteArgument(value)}`
);

export const warmUpCommand = (mode: EngineMode): string => (mode === 'bdd' ? 'go' : 'go_msat');

export const SHOW_VARIABLES_COMMAND = 'set';
export const RESET_COMMAND = 'reset';
export const BUILD_BOOLEAN_MODEL_COMMAND = 'build_boolean_model';
