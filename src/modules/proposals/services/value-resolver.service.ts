/**
 * Variable / Element Value Resolver
 *
 * Records per-proposal variable values and computed element costs. Items may
 * reference existing variables/elements or describe new proposal-owned ones.
 * A batch is all-or-nothing.
 */

import { getOrCreate, type ProposalStore } from '../../../store/proposal-store';
import { runWithPolicy } from '../../../store/transaction-policy';
import {
  proposalOwner,
  type Category,
  type Element,
  type ElementValueInput,
  type Proposal,
  type ResolvedElementValue,
  type ResolvedVariableValue,
  type Variable,
  type VariableValueInput,
} from '../../../types/proposal.types';
import { NotFoundError, ValidationError } from '../../../utils/errors';
import type { Logger } from '../../../utils/logger';
import { toResolvedElementValue } from './element-costs';

export class ValueResolverService {
  constructor(
    private readonly store: ProposalStore,
    private readonly logger: Logger,
  ) {}

  private async requireProposal(store: ProposalStore, proposalId: number): Promise<Proposal> {
    const proposal = await store.getProposal(proposalId);
    if (!proposal) {
      throw NotFoundError.of('Proposal', proposalId);
    }
    return proposal;
  }

  // ===== VARIABLE VALUES =====

  async setVariableValues(proposalId: number, items: readonly VariableValueInput[]): Promise<ResolvedVariableValue[]> {
    const proposal = await this.requireProposal(this.store, proposalId);

    const resolved = await runWithPolicy(this.store, 'ALL_OR_NOTHING', items, (tx, item) =>
      this.resolveVariableValue(tx, proposal, item));

    this.logger.info({ proposalId, count: resolved.length }, '[ValueResolver] Variable values saved');
    return resolved;
  }

  private async resolveVariableValue(
    tx: ProposalStore,
    proposal: Proposal,
    item: VariableValueInput,
  ): Promise<ResolvedVariableValue> {
    let variable: Variable;

    if (item.variable.kind === 'new') {
      const { name, type } = item.variable;
      if (!name.trim()) {
        throw new ValidationError('variable_name and variable_type are required');
      }
      variable = await tx.createVariable({
        owner: proposalOwner(proposal.id),
        name,
        type,
        defaultValue: item.value,
      });
    } else {
      const found = await tx.getVariable(item.variable.variableId);
      if (!found) {
        throw NotFoundError.of('Variable', item.variable.variableId);
      }
      variable = found;
    }

    const saved = await tx.upsertVariableValue({
      proposalId: proposal.id,
      variableId: variable.id,
      value: item.value,
    });

    return {
      variableId: variable.id,
      variableName: variable.name,
      variableType: variable.type,
      value: saved.value,
    };
  }

  async getVariableValues(proposalId: number): Promise<ResolvedVariableValue[]> {
    await this.requireProposal(this.store, proposalId);
    const details = await this.store.listVariableValues(proposalId);
    return details.map(({ value, variable }) => ({
      variableId: variable.id,
      variableName: variable.name,
      variableType: variable.type,
      value: value.value,
    }));
  }

  // ===== ELEMENT VALUES =====

  async updateElementValues(proposalId: number, items: readonly ElementValueInput[]): Promise<ResolvedElementValue[]> {
    const proposal = await this.requireProposal(this.store, proposalId);

    const resolved = await runWithPolicy(this.store, 'ALL_OR_NOTHING', items, (tx, item) =>
      this.resolveElementValue(tx, proposal, item));

    this.logger.info({ proposalId, count: resolved.length }, '[ValueResolver] Element values saved');
    return resolved;
  }

  /**
   * Find the proposal's category with this name, creating it when missing.
   */
  private async resolveCategory(
    tx: ProposalStore,
    proposal: Proposal,
    name: string,
    position: number,
  ): Promise<Category> {
    const owner = proposalOwner(proposal.id);
    const { entity } = await getOrCreate(
      () => tx.findCategoryByName(owner, name),
      () => tx.createCategory({ owner, name, position }),
    );
    return entity;
  }

  private async resolveElementValue(
    tx: ProposalStore,
    proposal: Proposal,
    item: ElementValueInput,
  ): Promise<ResolvedElementValue> {
    let element: Element;
    let category: Category | null = null;

    if (item.element.kind === 'new') {
      const { name } = item.element;
      if (!name.trim()) {
        throw new ValidationError('element_name is required');
      }
      if (item.categoryName) {
        category = await this.resolveCategory(tx, proposal, item.categoryName, item.categoryPosition ?? 0);
      }
      // Costs live on the value row only
      element = await tx.createElement({
        owner: proposalOwner(proposal.id),
        categoryId: category?.id ?? null,
        name,
        materialCost: '0',
        laborCost: '0',
        markupPercentage: item.markupPercentage,
        position: item.position ?? 0,
      });
    } else {
      const { elementId } = item.element;
      const found = await tx.getElement(elementId);
      if (!found) {
        throw NotFoundError.of('Element', elementId);
      }
      element = found;
      category = element.categoryId === null ? null : (await tx.getCategory(element.categoryId)) ?? null;

      const patch: { name?: string; position?: number; categoryId?: number } = {};
      if (item.name !== undefined && item.name !== element.name) patch.name = item.name;
      if (item.position !== undefined && item.position !== element.position) patch.position = item.position;
      if (item.categoryName && item.categoryName !== category?.name) {
        category = await this.resolveCategory(tx, proposal, item.categoryName, item.categoryPosition ?? 0);
        patch.categoryId = category.id;
      }

      if (Object.keys(patch).length > 0) {
        const updated = await tx.updateElement(element.id, patch);
        if (!updated) {
          throw NotFoundError.of('Element', elementId);
        }
        element = updated;
      }
    }

    const value = await tx.upsertElementValue({
      proposalId: proposal.id,
      elementId: element.id,
      calculatedMaterialCost: item.calculatedMaterialCost,
      calculatedLaborCost: item.calculatedLaborCost,
      markupPercentage: item.markupPercentage,
    });

    return toResolvedElementValue(value, element, category);
  }

  async getElementValues(proposalId: number): Promise<ResolvedElementValue[]> {
    await this.requireProposal(this.store, proposalId);
    const details = await this.store.listElementValues(proposalId);
    return details.map(({ value, element, category }) => toResolvedElementValue(value, element, category));
  }
}
