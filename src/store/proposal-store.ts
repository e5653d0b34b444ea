import type {
  Category,
  CategoryPatch,
  Element,
  ElementPatch,
  ElementValue,
  NewCategory,
  NewElement,
  NewProposal,
  NewTemplate,
  NewVariable,
  Owner,
  Proposal,
  ProposalPatch,
  Template,
  TemplatePatch,
  Variable,
  VariablePatch,
  VariableValue,
} from '../types/proposal.types';
import type { Contract, ContractPatch, NewContract } from '../types/contract.types';

export interface VariableValueDetail {
  value: VariableValue;
  variable: Variable;
}

export interface ElementValueDetail {
  value: ElementValue;
  element: Element;
  category: Category | null;
}

/**
 * Persistence boundary for the proposal graph.
 *
 * Lookups return `undefined` for a missing id; updates return `undefined`
 * when nothing matched; deletes report whether a row was removed.
 * `transaction` composes: calling it on a store that is already inside a
 * transaction opens a savepoint.
 */
export interface ProposalStore {
  transaction<T>(work: (store: ProposalStore) => Promise<T>): Promise<T>;

  // Template operations
  listTemplates(): Promise<Template[]>;
  getTemplate(id: number): Promise<Template | undefined>;
  createTemplate(input: NewTemplate): Promise<Template>;
  updateTemplate(id: number, patch: TemplatePatch): Promise<Template | undefined>;
  deleteTemplate(id: number): Promise<boolean>;

  // Proposal operations
  listProposals(): Promise<Proposal[]>;
  getProposal(id: number): Promise<Proposal | undefined>;
  /** Read the proposal and hold a row lock on it until the transaction ends. */
  lockProposal(id: number): Promise<Proposal | undefined>;
  createProposal(input: NewProposal): Promise<Proposal>;
  updateProposal(id: number, patch: ProposalPatch): Promise<Proposal | undefined>;
  deleteProposal(id: number): Promise<boolean>;

  // Category operations (ordered by position, then id)
  listCategories(owner: Owner): Promise<Category[]>;
  getCategory(id: number): Promise<Category | undefined>;
  findCategoryByName(owner: Owner, name: string): Promise<Category | undefined>;
  createCategory(input: NewCategory): Promise<Category>;
  updateCategory(id: number, patch: CategoryPatch): Promise<Category | undefined>;
  deleteCategory(id: number): Promise<boolean>;

  // Variable operations
  listVariables(owner: Owner): Promise<Variable[]>;
  getVariable(id: number): Promise<Variable | undefined>;
  createVariable(input: NewVariable): Promise<Variable>;
  updateVariable(id: number, patch: VariablePatch): Promise<Variable | undefined>;
  deleteVariable(id: number): Promise<boolean>;

  // Element operations (ordered by position, then id)
  listElements(owner: Owner): Promise<Element[]>;
  listElementsByCategory(categoryId: number): Promise<Element[]>;
  getElement(id: number): Promise<Element | undefined>;
  findElement(owner: Owner, name: string, categoryId: number | null): Promise<Element | undefined>;
  createElement(input: NewElement): Promise<Element>;
  updateElement(id: number, patch: ElementPatch): Promise<Element | undefined>;
  deleteElement(id: number): Promise<boolean>;

  // Value operations, keyed by (proposal, variable) / (proposal, element)
  listVariableValues(proposalId: number): Promise<VariableValueDetail[]>;
  getVariableValue(proposalId: number, variableId: number): Promise<VariableValue | undefined>;
  upsertVariableValue(value: VariableValue): Promise<VariableValue>;
  listElementValues(proposalId: number): Promise<ElementValueDetail[]>;
  upsertElementValue(value: ElementValue): Promise<ElementValue>;

  // Contract operations (a proposal's contracts are ordered by version)
  listContracts(filter?: { proposalId?: number }): Promise<Contract[]>;
  getContract(id: number): Promise<Contract | undefined>;
  createContract(input: NewContract): Promise<Contract>;
  updateContract(id: number, patch: ContractPatch): Promise<Contract | undefined>;
  deactivateContracts(ids: number[]): Promise<void>;
  deleteContract(id: number): Promise<boolean>;
}

/**
 * Return the entity `find` locates, or create it.
 * Must run inside a transaction to be race-free.
 */
export async function getOrCreate<T>(
  find: () => Promise<T | undefined>,
  create: () => Promise<T>,
): Promise<{ entity: T; created: boolean }> {
  const existing = await find();
  if (existing !== undefined) {
    return { entity: existing, created: false };
  }
  return { entity: await create(), created: true };
}
