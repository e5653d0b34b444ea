/**
 * Drizzle-backed ProposalStore (PostgreSQL via postgres.js).
 */

import { and, asc, eq, inArray, isNull } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import {
  proposalCategories,
  proposalElementValues,
  proposalElements,
  proposalVariableValues,
  proposalVariables,
  proposals,
  templates,
  type CategoryRow,
  type ElementRow,
  type ElementValueRow,
  type ProposalRow,
  type VariableRow,
  type VariableValueRow,
} from '../db/schema';
import { contracts, type ContractRow } from '../db/contracts-schema';
import type { fullSchema } from '../db';
import { fromNumeric, toNumeric } from '../utils/decimal';
import { isTransientDatabaseError, translateDatabaseError } from '../utils/database-error-handler';
import { withRetry } from '../utils/retry';
import type { Logger } from '../utils/logger';
import type { ElementValueDetail, ProposalStore, VariableValueDetail } from './proposal-store';
import {
  isVariableType,
  ownerFromColumns,
  ownerToColumns,
  type Category,
  type CategoryPatch,
  type Element,
  type ElementPatch,
  type ElementValue,
  type NewCategory,
  type NewElement,
  type NewProposal,
  type NewTemplate,
  type NewVariable,
  type Owner,
  type Proposal,
  type ProposalPatch,
  type Template,
  type TemplatePatch,
  type Variable,
  type VariablePatch,
  type VariableValue,
} from '../types/proposal.types';
import type { Contract, ContractPatch, NewContract } from '../types/contract.types';

type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof fullSchema>;

const TRANSACTION_RETRY = { attempts: 3, baseDelayMs: 50, factor: 2 };

// ============================================================================
// ROW MAPPERS
// ============================================================================

function toProposal(row: ProposalRow): Proposal {
  return {
    id: row.id,
    name: row.name,
    templateId: row.templateId,
    globalMarkupPercentage: fromNumeric(row.globalMarkupPercentage),
    createdAt: row.createdAt,
  };
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    owner: ownerFromColumns(row),
    name: row.name,
    position: row.position,
  };
}

function toVariable(row: VariableRow): Variable {
  if (!isVariableType(row.type)) {
    throw new Error(`Unknown variable type "${row.type}" on variable ${row.id}`);
  }
  return {
    id: row.id,
    owner: ownerFromColumns(row),
    name: row.name,
    type: row.type,
    defaultValue: fromNumeric(row.defaultValue),
  };
}

function toElement(row: ElementRow): Element {
  return {
    id: row.id,
    owner: ownerFromColumns(row),
    categoryId: row.categoryId,
    name: row.name,
    materialCost: row.materialCost,
    laborCost: row.laborCost,
    markupPercentage: fromNumeric(row.markupPercentage),
    position: row.position,
  };
}

function toVariableValue(row: VariableValueRow): VariableValue {
  return { proposalId: row.proposalId, variableId: row.variableId, value: fromNumeric(row.value) };
}

function toElementValue(row: ElementValueRow): ElementValue {
  return {
    proposalId: row.proposalId,
    elementId: row.elementId,
    calculatedMaterialCost: fromNumeric(row.calculatedMaterialCost),
    calculatedLaborCost: fromNumeric(row.calculatedLaborCost),
    markupPercentage: fromNumeric(row.markupPercentage),
  };
}

function toContract(row: ContractRow): Contract {
  return { ...row };
}

/** True when an update would not set any column. */
function isEmptyUpdate(values: object): boolean {
  return Object.values(values).every(value => value === undefined);
}

function ownerCondition(
  table: typeof proposalCategories | typeof proposalVariables | typeof proposalElements,
  owner: Owner,
): SQL | undefined {
  return owner.kind === 'template'
    ? and(eq(table.templateId, owner.templateId), isNull(table.proposalId))
    : and(eq(table.proposalId, owner.proposalId), isNull(table.templateId));
}

// ============================================================================
// STORE
// ============================================================================

export class DrizzleProposalStore implements ProposalStore {
  constructor(
    private readonly db: Executor,
    private readonly logger: Logger,
    private readonly inTransaction = false,
  ) {}

  async transaction<T>(work: (store: ProposalStore) => Promise<T>): Promise<T> {
    // Nested calls run inside a savepoint of the enclosing transaction
    if (this.inTransaction) {
      return this.db.transaction(tx => work(new DrizzleProposalStore(tx, this.logger, true)));
    }

    try {
      return await withRetry(
        () => this.db.transaction(tx => work(new DrizzleProposalStore(tx, this.logger, true))),
        {
          ...TRANSACTION_RETRY,
          shouldRetry: isTransientDatabaseError,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn({ err: error, attempt, delayMs }, '[ProposalStore] Transient conflict, retrying transaction');
          },
        },
      );
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  // ===== TEMPLATES =====

  async listTemplates(): Promise<Template[]> {
    return this.db.select().from(templates).orderBy(asc(templates.id));
  }

  async getTemplate(id: number): Promise<Template | undefined> {
    const [row] = await this.db.select().from(templates).where(eq(templates.id, id)).limit(1);
    return row;
  }

  async createTemplate(input: NewTemplate): Promise<Template> {
    const [row] = await this.db.insert(templates).values(input).returning();
    return row;
  }

  async updateTemplate(id: number, patch: TemplatePatch): Promise<Template | undefined> {
    if (isEmptyUpdate(patch)) return this.getTemplate(id);
    const [row] = await this.db.update(templates).set(patch).where(eq(templates.id, id)).returning();
    return row;
  }

  async deleteTemplate(id: number): Promise<boolean> {
    const rows = await this.db.delete(templates).where(eq(templates.id, id)).returning({ id: templates.id });
    return rows.length > 0;
  }

  // ===== PROPOSALS =====

  async listProposals(): Promise<Proposal[]> {
    const rows = await this.db.select().from(proposals).orderBy(asc(proposals.id));
    return rows.map(toProposal);
  }

  async getProposal(id: number): Promise<Proposal | undefined> {
    const [row] = await this.db.select().from(proposals).where(eq(proposals.id, id)).limit(1);
    return row ? toProposal(row) : undefined;
  }

  async lockProposal(id: number): Promise<Proposal | undefined> {
    const [row] = await this.db.select().from(proposals).where(eq(proposals.id, id)).limit(1).for('update');
    return row ? toProposal(row) : undefined;
  }

  async createProposal(input: NewProposal): Promise<Proposal> {
    const [row] = await this.db
      .insert(proposals)
      .values({
        name: input.name,
        templateId: input.templateId,
        globalMarkupPercentage: toNumeric(input.globalMarkupPercentage),
      })
      .returning();
    return toProposal(row);
  }

  async updateProposal(id: number, patch: ProposalPatch): Promise<Proposal | undefined> {
    const { globalMarkupPercentage, ...rest } = patch;
    const values = {
      ...rest,
      ...(globalMarkupPercentage === undefined ? {} : { globalMarkupPercentage: toNumeric(globalMarkupPercentage) }),
    };
    if (isEmptyUpdate(values)) return this.getProposal(id);
    const [row] = await this.db.update(proposals).set(values).where(eq(proposals.id, id)).returning();
    return row ? toProposal(row) : undefined;
  }

  async deleteProposal(id: number): Promise<boolean> {
    const rows = await this.db.delete(proposals).where(eq(proposals.id, id)).returning({ id: proposals.id });
    return rows.length > 0;
  }

  // ===== CATEGORIES =====

  async listCategories(owner: Owner): Promise<Category[]> {
    const rows = await this.db
      .select()
      .from(proposalCategories)
      .where(ownerCondition(proposalCategories, owner))
      .orderBy(asc(proposalCategories.position), asc(proposalCategories.id));
    return rows.map(toCategory);
  }

  async getCategory(id: number): Promise<Category | undefined> {
    const [row] = await this.db.select().from(proposalCategories).where(eq(proposalCategories.id, id)).limit(1);
    return row ? toCategory(row) : undefined;
  }

  async findCategoryByName(owner: Owner, name: string): Promise<Category | undefined> {
    const [row] = await this.db
      .select()
      .from(proposalCategories)
      .where(and(ownerCondition(proposalCategories, owner), eq(proposalCategories.name, name)))
      .orderBy(asc(proposalCategories.id))
      .limit(1);
    return row ? toCategory(row) : undefined;
  }

  async createCategory(input: NewCategory): Promise<Category> {
    const [row] = await this.db
      .insert(proposalCategories)
      .values({ name: input.name, position: input.position, ...ownerToColumns(input.owner) })
      .returning();
    return toCategory(row);
  }

  async updateCategory(id: number, patch: CategoryPatch): Promise<Category | undefined> {
    if (isEmptyUpdate(patch)) return this.getCategory(id);
    const [row] = await this.db.update(proposalCategories).set(patch).where(eq(proposalCategories.id, id)).returning();
    return row ? toCategory(row) : undefined;
  }

  async deleteCategory(id: number): Promise<boolean> {
    const rows = await this.db
      .delete(proposalCategories)
      .where(eq(proposalCategories.id, id))
      .returning({ id: proposalCategories.id });
    return rows.length > 0;
  }

  // ===== VARIABLES =====

  async listVariables(owner: Owner): Promise<Variable[]> {
    const rows = await this.db
      .select()
      .from(proposalVariables)
      .where(ownerCondition(proposalVariables, owner))
      .orderBy(asc(proposalVariables.id));
    return rows.map(toVariable);
  }

  async getVariable(id: number): Promise<Variable | undefined> {
    const [row] = await this.db.select().from(proposalVariables).where(eq(proposalVariables.id, id)).limit(1);
    return row ? toVariable(row) : undefined;
  }

  async createVariable(input: NewVariable): Promise<Variable> {
    const [row] = await this.db
      .insert(proposalVariables)
      .values({
        name: input.name,
        type: input.type,
        defaultValue: toNumeric(input.defaultValue),
        ...ownerToColumns(input.owner),
      })
      .returning();
    return toVariable(row);
  }

  async updateVariable(id: number, patch: VariablePatch): Promise<Variable | undefined> {
    const { defaultValue, ...rest } = patch;
    const values = {
      ...rest,
      ...(defaultValue === undefined ? {} : { defaultValue: toNumeric(defaultValue) }),
    };
    if (isEmptyUpdate(values)) return this.getVariable(id);
    const [row] = await this.db.update(proposalVariables).set(values).where(eq(proposalVariables.id, id)).returning();
    return row ? toVariable(row) : undefined;
  }

  async deleteVariable(id: number): Promise<boolean> {
    const rows = await this.db
      .delete(proposalVariables)
      .where(eq(proposalVariables.id, id))
      .returning({ id: proposalVariables.id });
    return rows.length > 0;
  }

  // ===== ELEMENTS =====

  async listElements(owner: Owner): Promise<Element[]> {
    const rows = await this.db
      .select()
      .from(proposalElements)
      .where(ownerCondition(proposalElements, owner))
      .orderBy(asc(proposalElements.position), asc(proposalElements.id));
    return rows.map(toElement);
  }

  async listElementsByCategory(categoryId: number): Promise<Element[]> {
    const rows = await this.db
      .select()
      .from(proposalElements)
      .where(eq(proposalElements.categoryId, categoryId))
      .orderBy(asc(proposalElements.position), asc(proposalElements.id));
    return rows.map(toElement);
  }

  async getElement(id: number): Promise<Element | undefined> {
    const [row] = await this.db.select().from(proposalElements).where(eq(proposalElements.id, id)).limit(1);
    return row ? toElement(row) : undefined;
  }

  async findElement(owner: Owner, name: string, categoryId: number | null): Promise<Element | undefined> {
    const [row] = await this.db
      .select()
      .from(proposalElements)
      .where(and(
        ownerCondition(proposalElements, owner),
        eq(proposalElements.name, name),
        categoryId === null ? isNull(proposalElements.categoryId) : eq(proposalElements.categoryId, categoryId),
      ))
      .orderBy(asc(proposalElements.id))
      .limit(1);
    return row ? toElement(row) : undefined;
  }

  async createElement(input: NewElement): Promise<Element> {
    const [row] = await this.db
      .insert(proposalElements)
      .values({
        name: input.name,
        categoryId: input.categoryId,
        materialCost: input.materialCost,
        laborCost: input.laborCost,
        markupPercentage: toNumeric(input.markupPercentage),
        position: input.position,
        ...ownerToColumns(input.owner),
      })
      .returning();
    return toElement(row);
  }

  async updateElement(id: number, patch: ElementPatch): Promise<Element | undefined> {
    const { markupPercentage, ...rest } = patch;
    const values = {
      ...rest,
      ...(markupPercentage === undefined ? {} : { markupPercentage: toNumeric(markupPercentage) }),
    };
    if (isEmptyUpdate(values)) return this.getElement(id);
    const [row] = await this.db.update(proposalElements).set(values).where(eq(proposalElements.id, id)).returning();
    return row ? toElement(row) : undefined;
  }

  async deleteElement(id: number): Promise<boolean> {
    const rows = await this.db
      .delete(proposalElements)
      .where(eq(proposalElements.id, id))
      .returning({ id: proposalElements.id });
    return rows.length > 0;
  }

  // ===== VALUES =====

  async listVariableValues(proposalId: number): Promise<VariableValueDetail[]> {
    const rows = await this.db
      .select({ value: proposalVariableValues, variable: proposalVariables })
      .from(proposalVariableValues)
      .innerJoin(proposalVariables, eq(proposalVariableValues.variableId, proposalVariables.id))
      .where(eq(proposalVariableValues.proposalId, proposalId))
      .orderBy(asc(proposalVariableValues.id));
    return rows.map(row => ({ value: toVariableValue(row.value), variable: toVariable(row.variable) }));
  }

  async getVariableValue(proposalId: number, variableId: number): Promise<VariableValue | undefined> {
    const [row] = await this.db
      .select()
      .from(proposalVariableValues)
      .where(and(eq(proposalVariableValues.proposalId, proposalId), eq(proposalVariableValues.variableId, variableId)))
      .limit(1);
    return row ? toVariableValue(row) : undefined;
  }

  async upsertVariableValue(value: VariableValue): Promise<VariableValue> {
    const [row] = await this.db
      .insert(proposalVariableValues)
      .values({ proposalId: value.proposalId, variableId: value.variableId, value: toNumeric(value.value) })
      .onConflictDoUpdate({
        target: [proposalVariableValues.proposalId, proposalVariableValues.variableId],
        set: { value: toNumeric(value.value) },
      })
      .returning();
    return toVariableValue(row);
  }

  async listElementValues(proposalId: number): Promise<ElementValueDetail[]> {
    const rows = await this.db
      .select({ value: proposalElementValues, element: proposalElements, category: proposalCategories })
      .from(proposalElementValues)
      .innerJoin(proposalElements, eq(proposalElementValues.elementId, proposalElements.id))
      .leftJoin(proposalCategories, eq(proposalElements.categoryId, proposalCategories.id))
      .where(eq(proposalElementValues.proposalId, proposalId))
      .orderBy(asc(proposalCategories.position), asc(proposalElements.position), asc(proposalElements.id));
    return rows.map(row => ({
      value: toElementValue(row.value),
      element: toElement(row.element),
      category: row.category ? toCategory(row.category) : null,
    }));
  }

  async upsertElementValue(value: ElementValue): Promise<ElementValue> {
    const costs = {
      calculatedMaterialCost: toNumeric(value.calculatedMaterialCost),
      calculatedLaborCost: toNumeric(value.calculatedLaborCost),
      markupPercentage: toNumeric(value.markupPercentage),
    };
    const [row] = await this.db
      .insert(proposalElementValues)
      .values({ proposalId: value.proposalId, elementId: value.elementId, ...costs })
      .onConflictDoUpdate({
        target: [proposalElementValues.proposalId, proposalElementValues.elementId],
        set: costs,
      })
      .returning();
    return toElementValue(row);
  }

  // ===== CONTRACTS =====

  async listContracts(filter: { proposalId?: number } = {}): Promise<Contract[]> {
    const query = this.db.select().from(contracts);
    const rows = filter.proposalId === undefined
      ? await query.orderBy(asc(contracts.id))
      : await query.where(eq(contracts.proposalId, filter.proposalId)).orderBy(asc(contracts.version));
    return rows.map(toContract);
  }

  async getContract(id: number): Promise<Contract | undefined> {
    const [row] = await this.db.select().from(contracts).where(eq(contracts.id, id)).limit(1);
    return row ? toContract(row) : undefined;
  }

  async createContract(input: NewContract): Promise<Contract> {
    const [row] = await this.db.insert(contracts).values(input).returning();
    return toContract(row);
  }

  async updateContract(id: number, patch: ContractPatch): Promise<Contract | undefined> {
    if (isEmptyUpdate(patch)) return this.getContract(id);
    const [row] = await this.db.update(contracts).set(patch).where(eq(contracts.id, id)).returning();
    return row ? toContract(row) : undefined;
  }

  async deactivateContracts(ids: number[]): Promise<void> {
    if (ids.length === 0) return;
    await this.db.update(contracts).set({ isActive: false }).where(inArray(contracts.id, ids));
  }

  async deleteContract(id: number): Promise<boolean> {
    const rows = await this.db.delete(contracts).where(eq(contracts.id, id)).returning({ id: contracts.id });
    return rows.length > 0;
  }
}
