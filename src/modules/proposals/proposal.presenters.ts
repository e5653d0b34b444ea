import type {
  Proposal,
  ResolvedElementValue,
  ResolvedVariableValue,
  TemplateSyncResult,
} from '../../types/proposal.types';

export function presentProposal(proposal: Proposal) {
  return {
    id: proposal.id,
    name: proposal.name,
    created_at: proposal.createdAt.toISOString(),
    global_markup_percentage: proposal.globalMarkupPercentage,
    template_id: proposal.templateId,
  };
}

export function presentVariableValue(value: ResolvedVariableValue) {
  return {
    variable_id: value.variableId,
    variable_name: value.variableName,
    variable_type: value.variableType,
    value: value.value,
  };
}

export function presentElementValue(value: ResolvedElementValue) {
  return {
    element_id: value.elementId,
    element_name: value.elementName,
    category_id: value.categoryId,
    category_name: value.categoryName,
    position: value.position,
    calculated_material_cost: value.calculatedMaterialCost,
    calculated_labor_cost: value.calculatedLaborCost,
    markup_percentage: value.markupPercentage,
    total_cost: value.totalCost,
    total_with_markup: value.totalWithMarkup,
  };
}

export function presentSyncResult(result: TemplateSyncResult) {
  return {
    added_variables: result.addedVariables,
    updated_variables: result.updatedVariables,
    added_elements: result.addedElements,
  };
}
