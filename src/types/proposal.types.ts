/**
 * Proposal domain types
 *
 * Categories, variables and elements belong either to a template (reusable
 * blueprint) or to one proposal (instantiated / ad hoc). `Owner` makes that
 * an explicit variant instead of two nullable references.
 */

export const VARIABLE_TYPES = ['LINEAR_FEET', 'SQUARE_FEET', 'CUBIC_FEET', 'COUNT'] as const;

export type VariableType = typeof VARIABLE_TYPES[number];

export function isVariableType(value: unknown): value is VariableType {
  return VARIABLE_TYPES.some(type => type === value);
}

export type Owner =
  | { kind: 'template'; templateId: number }
  | { kind: 'proposal'; proposalId: number };

export const templateOwner = (templateId: number): Owner => ({ kind: 'template', templateId });
export const proposalOwner = (proposalId: number): Owner => ({ kind: 'proposal', proposalId });

export interface OwnerColumns {
  templateId: number | null;
  proposalId: number | null;
}

export function ownerToColumns(owner: Owner): OwnerColumns {
  return owner.kind === 'template'
    ? { templateId: owner.templateId, proposalId: null }
    : { templateId: null, proposalId: owner.proposalId };
}

export function ownerFromColumns(columns: OwnerColumns): Owner {
  const { templateId, proposalId } = columns;
  if (templateId !== null && proposalId === null) return templateOwner(templateId);
  if (proposalId !== null && templateId === null) return proposalOwner(proposalId);
  throw new Error(`Invalid owner: template=${templateId}, proposal=${proposalId}`);
}

export function isSameOwner(a: Owner, b: Owner): boolean {
  if (a.kind === 'template' && b.kind === 'template') return a.templateId === b.templateId;
  if (a.kind === 'proposal' && b.kind === 'proposal') return a.proposalId === b.proposalId;
  return false;
}

// ============================================================================
// ENTITIES
// ============================================================================

export interface Template {
  id: number;
  name: string;
  description: string;
  createdAt: Date;
}

export interface Proposal {
  id: number;
  name: string;
  templateId: number | null;
  globalMarkupPercentage: number;
  createdAt: Date;
}

export interface Category {
  id: number;
  owner: Owner;
  name: string;
  position: number;
}

export interface Variable {
  id: number;
  owner: Owner;
  name: string;
  type: VariableType;
  defaultValue: number;
}

export interface Element {
  id: number;
  owner: Owner;
  categoryId: number | null;
  name: string;
  /** Formula or fixed value; only literal decimals are interpreted. */
  materialCost: string;
  laborCost: string;
  markupPercentage: number;
  position: number;
}

export interface VariableValue {
  proposalId: number;
  variableId: number;
  value: number;
}

export interface ElementValue {
  proposalId: number;
  elementId: number;
  calculatedMaterialCost: number;
  calculatedLaborCost: number;
  markupPercentage: number;
}

export type NewTemplate = Pick<Template, 'name' | 'description'>;
export type NewProposal = Pick<Proposal, 'name' | 'templateId' | 'globalMarkupPercentage'>;
export type NewCategory = Omit<Category, 'id'>;
export type NewVariable = Omit<Variable, 'id'>;
export type NewElement = Omit<Element, 'id'>;

export type TemplatePatch = Partial<NewTemplate>;
export type ProposalPatch = Partial<Pick<Proposal, 'name' | 'globalMarkupPercentage'>>;
export type CategoryPatch = Partial<Pick<Category, 'name' | 'position'>>;
export type VariablePatch = Partial<Pick<Variable, 'name' | 'type' | 'defaultValue'>>;
export type ElementPatch = Partial<
  Pick<Element, 'name' | 'categoryId' | 'materialCost' | 'laborCost' | 'markupPercentage' | 'position'>
>;

// ============================================================================
// VALUE RESOLVER REQUESTS / VIEWS
// ============================================================================

export type VariableRef =
  | { kind: 'existing'; variableId: number }
  | { kind: 'new'; name: string; type: VariableType };

export interface VariableValueInput {
  variable: VariableRef;
  value: number;
}

export interface ResolvedVariableValue {
  variableId: number;
  variableName: string;
  variableType: VariableType;
  value: number;
}

export type ElementRef =
  | { kind: 'existing'; elementId: number }
  | { kind: 'new'; name: string };

export interface ElementValueInput {
  element: ElementRef;
  /** Rename an existing element. */
  name?: string;
  categoryName?: string;
  categoryPosition?: number;
  position?: number;
  calculatedMaterialCost: number;
  calculatedLaborCost: number;
  markupPercentage: number;
}

export interface ResolvedElementValue {
  elementId: number;
  elementName: string;
  categoryId: number | null;
  categoryName: string | null;
  position: number;
  calculatedMaterialCost: number;
  calculatedLaborCost: number;
  markupPercentage: number;
  totalCost: number;
  totalWithMarkup: number;
}

export interface TemplateSyncResult {
  addedVariables: string[];
  updatedVariables: string[];
  addedElements: string[];
}

/**
 * How a multi-item operation treats a failing item.
 * ALL_OR_NOTHING aborts the whole unit; BEST_EFFORT skips the item.
 */
export type TransactionPolicy = 'ALL_OR_NOTHING' | 'BEST_EFFORT';
