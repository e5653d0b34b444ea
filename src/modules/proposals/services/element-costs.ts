import { parseDecimalOrZero, stripFloatNoise } from '../../../utils/decimal';
import type { Category, Element, ElementValue, ResolvedElementValue } from '../../../types/proposal.types';

/**
 * Initial computed costs for an element copied into a proposal.
 * Cost strings that are not plain decimals count as unresolved formulas (0).
 */
export function initialElementValue(proposalId: number, element: Element): ElementValue {
  return {
    proposalId,
    elementId: element.id,
    calculatedMaterialCost: parseDecimalOrZero(element.materialCost),
    calculatedLaborCost: parseDecimalOrZero(element.laborCost),
    markupPercentage: element.markupPercentage,
  };
}

export function totalCost(value: Pick<ElementValue, 'calculatedMaterialCost' | 'calculatedLaborCost'>): number {
  return stripFloatNoise(value.calculatedMaterialCost + value.calculatedLaborCost);
}

export function totalWithMarkup(value: ElementValue): number {
  return stripFloatNoise(totalCost(value) * (1 + value.markupPercentage / 100));
}

export function toResolvedElementValue(
  value: ElementValue,
  element: Element,
  category: Category | null,
): ResolvedElementValue {
  return {
    elementId: element.id,
    elementName: element.name,
    categoryId: category?.id ?? null,
    categoryName: category?.name ?? null,
    position: element.position,
    calculatedMaterialCost: value.calculatedMaterialCost,
    calculatedLaborCost: value.calculatedLaborCost,
    markupPercentage: value.markupPercentage,
    totalCost: totalCost(value),
    totalWithMarkup: totalWithMarkup(value),
  };
}
