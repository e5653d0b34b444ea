/**
 * Wire format of the value endpoints.
 *
 * Clients mark items that are not persisted yet either with `kind: "new"` or,
 * as older clients do, with a negative id. Both become an explicit
 * `{ kind: 'new' }` reference here.
 */

import type {
  ElementValueInput,
  VariableType,
  VariableValueInput,
} from '../../types/proposal.types';
import { VARIABLE_TYPES } from '../../types/proposal.types';
import { ValidationError } from '../../utils/errors';
import { amountProperty, measurementProperty, percentageProperty } from '../../utils/route-schemas';

export interface VariableValueItem {
  kind?: 'existing' | 'new';
  variable_id?: number;
  variable_name?: string;
  variable_type?: VariableType;
  value: number;
}

export interface ElementValueItem {
  kind?: 'existing' | 'new';
  element_id?: number;
  element_name?: string;
  category_name?: string;
  category_position?: number;
  position?: number;
  calculated_material_cost: number;
  calculated_labor_cost: number;
  markup_percentage?: number;
}

const refKind = (kind: VariableValueItem['kind'], id: number | undefined): 'existing' | 'new' =>
  kind ?? (id === undefined || id < 0 ? 'new' : 'existing');

export function toVariableValueInput(item: VariableValueItem): VariableValueInput {
  if (refKind(item.kind, item.variable_id) === 'new') {
    if (!item.variable_name || !item.variable_type) {
      throw new ValidationError('variable_name and variable_type are required');
    }
    return { variable: { kind: 'new', name: item.variable_name, type: item.variable_type }, value: item.value };
  }
  if (item.variable_id === undefined) {
    throw new ValidationError('variable_id is required');
  }
  return { variable: { kind: 'existing', variableId: item.variable_id }, value: item.value };
}

export function toElementValueInput(item: ElementValueItem): ElementValueInput {
  const costs = {
    categoryName: item.category_name || undefined,
    categoryPosition: item.category_position,
    position: item.position,
    calculatedMaterialCost: item.calculated_material_cost,
    calculatedLaborCost: item.calculated_labor_cost,
    markupPercentage: item.markup_percentage ?? 0,
  };

  if (refKind(item.kind, item.element_id) === 'new') {
    if (!item.element_name) {
      throw new ValidationError('element_name is required');
    }
    return { element: { kind: 'new', name: item.element_name }, ...costs };
  }
  if (item.element_id === undefined) {
    throw new ValidationError('element_id is required');
  }
  return { element: { kind: 'existing', elementId: item.element_id }, name: item.element_name, ...costs };
}

// ============================================================================
// JSON SCHEMAS
// ============================================================================

export const variableValueItemSchema = {
  type: 'object',
  required: ['value'],
  properties: {
    kind: { type: 'string', enum: ['existing', 'new'] },
    variable_id: { type: 'integer' },
    variable_name: { type: 'string', maxLength: 255 },
    variable_type: { type: 'string', enum: [...VARIABLE_TYPES] },
    value: measurementProperty,
  },
} as const;

export const elementValueItemSchema = {
  type: 'object',
  required: ['calculated_material_cost', 'calculated_labor_cost'],
  properties: {
    kind: { type: 'string', enum: ['existing', 'new'] },
    element_id: { type: 'integer' },
    element_name: { type: 'string', maxLength: 255 },
    category_name: { type: 'string', maxLength: 255 },
    category_position: { type: 'integer' },
    position: { type: 'integer' },
    calculated_material_cost: amountProperty,
    calculated_labor_cost: amountProperty,
    markup_percentage: { ...percentageProperty, default: 0 },
  },
} as const;
