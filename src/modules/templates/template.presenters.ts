import { ownerToColumns, type Category, type Element, type Template, type Variable } from '../../types/proposal.types';

export function presentTemplate(template: Template) {
  return {
    id: template.id,
    name: template.name,
    description: template.description,
    created_at: template.createdAt.toISOString(),
  };
}

export function presentCategory(category: Category) {
  const { templateId, proposalId } = ownerToColumns(category.owner);
  return {
    id: category.id,
    name: category.name,
    position: category.position,
    template_id: templateId,
    proposal_id: proposalId,
  };
}

export function presentVariable(variable: Variable) {
  const { templateId, proposalId } = ownerToColumns(variable.owner);
  return {
    id: variable.id,
    name: variable.name,
    type: variable.type,
    default_value: variable.defaultValue,
    template_id: templateId,
    proposal_id: proposalId,
  };
}

export function presentElement(element: Element) {
  const { templateId, proposalId } = ownerToColumns(element.owner);
  return {
    id: element.id,
    name: element.name,
    category_id: element.categoryId,
    material_cost: element.materialCost,
    labor_cost: element.laborCost,
    markup_percentage: element.markupPercentage,
    position: element.position,
    template_id: templateId,
    proposal_id: proposalId,
  };
}
