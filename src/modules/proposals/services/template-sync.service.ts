/**
 * Template Sync Service
 *
 * Pulls template changes into a proposal that was cloned from it:
 * - variables: add missing values, reset values that differ from the default
 * - categories/elements: add the ones the proposal lacks
 * Existing proposal elements and their values are never modified.
 *
 * Each item runs best-effort: a failing item is rolled back, logged and
 * skipped while the rest of the sync proceeds.
 */

import { getOrCreate, type ProposalStore } from '../../../store/proposal-store';
import { runWithPolicy } from '../../../store/transaction-policy';
import {
  proposalOwner,
  templateOwner,
  type Category,
  type Element,
  type Proposal,
  type Template,
  type TemplateSyncResult,
  type Variable,
} from '../../../types/proposal.types';
import { NotFoundError, ValidationError, errorMessage } from '../../../utils/errors';
import type { Logger } from '../../../utils/logger';
import { initialElementValue } from './element-costs';

type VariableChange = { name: string; change: 'added' | 'updated' | 'unchanged' };

export class TemplateSyncService {
  constructor(
    private readonly store: ProposalStore,
    private readonly logger: Logger,
  ) {}

  async syncProposalWithTemplate(proposalId: number): Promise<TemplateSyncResult> {
    const proposal = await this.store.getProposal(proposalId);
    if (!proposal) {
      throw NotFoundError.of('Proposal', proposalId);
    }
    if (proposal.templateId === null) {
      throw new ValidationError('Proposal has no associated template');
    }
    const template = await this.store.getTemplate(proposal.templateId);
    if (!template) {
      throw NotFoundError.of('Template', proposal.templateId);
    }

    // Phase 1: variables
    const variableChanges = await this.syncVariables(proposal, template);

    // Phase 2: categories and elements
    const addedElements = await this.syncStructure(proposal, template);

    const result: TemplateSyncResult = {
      addedVariables: variableChanges.filter(c => c.change === 'added').map(c => c.name),
      updatedVariables: variableChanges.filter(c => c.change === 'updated').map(c => c.name),
      addedElements,
    };

    this.logger.info(
      {
        proposalId,
        templateId: template.id,
        added: result.addedVariables.length,
        updated: result.updatedVariables.length,
        addedElements: result.addedElements.length,
      },
      '[TemplateSync] Proposal synced with template',
    );
    return result;
  }

  private async syncVariables(proposal: Proposal, template: Template): Promise<VariableChange[]> {
    const variables = await this.store.listVariables(templateOwner(template.id));

    return runWithPolicy(
      this.store,
      'BEST_EFFORT',
      variables,
      async (tx, variable): Promise<VariableChange> => {
        const current = await tx.getVariableValue(proposal.id, variable.id);
        if (current && current.value === variable.defaultValue) {
          return { name: variable.name, change: 'unchanged' };
        }
        await tx.upsertVariableValue({ proposalId: proposal.id, variableId: variable.id, value: variable.defaultValue });
        return { name: variable.name, change: current ? 'updated' : 'added' };
      },
      { onSkip: (variable: Variable, error) => this.logSkip(proposal, 'variable', variable.name, error) },
    );
  }

  private async syncStructure(proposal: Proposal, template: Template): Promise<string[]> {
    const categories = await this.store.listCategories(templateOwner(template.id));
    const owner = proposalOwner(proposal.id);

    const perCategory = await runWithPolicy(
      this.store,
      'BEST_EFFORT',
      categories,
      async (tx, category): Promise<string[]> => {
        const { entity: target } = await getOrCreate(
          () => tx.findCategoryByName(owner, category.name),
          () => tx.createCategory({ owner, name: category.name, position: category.position }),
        );

        const elements = await tx.listElementsByCategory(category.id);
        const added = await runWithPolicy(
          tx,
          'BEST_EFFORT',
          elements,
          (inner, element) => this.syncElement(inner, proposal, target, element),
          { onSkip: (element: Element, error) => this.logSkip(proposal, 'element', element.name, error) },
        );
        return added.filter((name): name is string => name !== null);
      },
      { onSkip: (category: Category, error) => this.logSkip(proposal, 'category', category.name, error) },
    );

    return perCategory.flat();
  }

  /** Returns the element name when it was added, null when it already existed. */
  private async syncElement(
    tx: ProposalStore,
    proposal: Proposal,
    target: Category,
    element: Element,
  ): Promise<string | null> {
    const owner = proposalOwner(proposal.id);
    const { entity, created } = await getOrCreate(
      () => tx.findElement(owner, element.name, target.id),
      () => tx.createElement({
        owner,
        categoryId: target.id,
        name: element.name,
        materialCost: element.materialCost,
        laborCost: element.laborCost,
        markupPercentage: element.markupPercentage,
        position: element.position,
      }),
    );
    if (!created) return null;

    await tx.upsertElementValue(initialElementValue(proposal.id, entity));
    return entity.name;
  }

  private logSkip(proposal: Proposal, kind: string, name: string, error: unknown): void {
    this.logger.warn(
      { proposalId: proposal.id, kind, name, err: error },
      `[TemplateSync] Skipped ${kind} "${name}": ${errorMessage(error)}`,
    );
  }
}
