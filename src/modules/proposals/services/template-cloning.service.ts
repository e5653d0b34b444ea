/**
 * Template Cloning Service
 * Materializes a proposal-owned copy of a template's structure.
 */

import type { ProposalStore } from '../../../store/proposal-store';
import { proposalOwner, templateOwner, type Proposal } from '../../../types/proposal.types';
import { NotFoundError } from '../../../utils/errors';
import type { Logger } from '../../../utils/logger';
import { initialElementValue } from './element-costs';

export interface InstantiateProposalParams {
  templateId: number;
  name: string;
  globalMarkupPercentage: number;
}

export class TemplateCloningService {
  constructor(
    private readonly store: ProposalStore,
    private readonly logger: Logger,
  ) {}

  /**
   * Create a proposal from a template in a single transaction:
   * variable values at their defaults, then categories (by position) with
   * their elements and initial element values. Nothing is kept on failure.
   */
  async instantiateProposalFromTemplate(params: InstantiateProposalParams): Promise<Proposal> {
    const { templateId, name, globalMarkupPercentage } = params;

    const { proposal, categoryCount, elementCount, variableCount } = await this.store.transaction(async tx => {
      const template = await tx.getTemplate(templateId);
      if (!template) {
        throw NotFoundError.of('Template', templateId);
      }

      const proposal = await tx.createProposal({ name, templateId: template.id, globalMarkupPercentage });
      const source = templateOwner(template.id);
      const target = proposalOwner(proposal.id);

      // 1. Seed variable values from template defaults
      const variables = await tx.listVariables(source);
      for (const variable of variables) {
        await tx.upsertVariableValue({
          proposalId: proposal.id,
          variableId: variable.id,
          value: variable.defaultValue,
        });
      }

      // 2. Clone categories and their elements
      const categories = await tx.listCategories(source);
      let elementCount = 0;
      for (const category of categories) {
        const categoryCopy = await tx.createCategory({
          owner: target,
          name: category.name,
          position: category.position,
        });

        for (const element of await tx.listElementsByCategory(category.id)) {
          const elementCopy = await tx.createElement({
            owner: target,
            categoryId: categoryCopy.id,
            name: element.name,
            materialCost: element.materialCost,
            laborCost: element.laborCost,
            markupPercentage: element.markupPercentage,
            position: element.position,
          });
          await tx.upsertElementValue(initialElementValue(proposal.id, elementCopy));
          elementCount += 1;
        }
      }

      return { proposal, categoryCount: categories.length, elementCount, variableCount: variables.length };
    });

    this.logger.info(
      { proposalId: proposal.id, templateId, categoryCount, elementCount, variableCount },
      '[TemplateCloning] Proposal created from template',
    );
    return proposal;
  }

  async createProposalFromScratch(params: { name: string; globalMarkupPercentage: number }): Promise<Proposal> {
    const proposal = await this.store.createProposal({
      name: params.name,
      templateId: null,
      globalMarkupPercentage: params.globalMarkupPercentage,
    });
    this.logger.info({ proposalId: proposal.id }, '[TemplateCloning] Empty proposal created');
    return proposal;
  }
}
