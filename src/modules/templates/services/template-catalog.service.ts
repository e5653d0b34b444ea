/**
 * Template Catalog Service
 * CRUD for templates and the categories, variables and elements they own.
 * Category/element update and delete also serve proposal-owned rows.
 */

import type { ProposalStore } from '../../../store/proposal-store';
import {
  templateOwner,
  type Category,
  type CategoryPatch,
  type Element,
  type ElementPatch,
  type NewTemplate,
  type Template,
  type TemplatePatch,
  type Variable,
  type VariablePatch,
  type VariableType,
} from '../../../types/proposal.types';
import { NotFoundError } from '../../../utils/errors';
import type { Logger } from '../../../utils/logger';

export interface CreateVariableParams {
  name: string;
  type: VariableType;
  defaultValue: number;
}

export interface CreateElementParams {
  name: string;
  materialCost: string;
  laborCost: string;
  markupPercentage: number;
  position: number;
}

export class TemplateCatalogService {
  constructor(
    private readonly store: ProposalStore,
    private readonly logger: Logger,
  ) {}

  // ===== TEMPLATES =====

  listTemplates(): Promise<Template[]> {
    return this.store.listTemplates();
  }

  async getTemplate(id: number): Promise<Template> {
    const template = await this.store.getTemplate(id);
    if (!template) throw NotFoundError.of('Template', id);
    return template;
  }

  async createTemplate(input: NewTemplate): Promise<Template> {
    const template = await this.store.createTemplate(input);
    this.logger.info({ templateId: template.id }, '[TemplateCatalog] Template created');
    return template;
  }

  async updateTemplate(id: number, patch: TemplatePatch): Promise<Template> {
    const template = await this.store.updateTemplate(id, patch);
    if (!template) throw NotFoundError.of('Template', id);
    return template;
  }

  /** Proposals cloned from the template survive with their link cleared. */
  async deleteTemplate(id: number): Promise<void> {
    if (!(await this.store.deleteTemplate(id))) throw NotFoundError.of('Template', id);
    this.logger.info({ templateId: id }, '[TemplateCatalog] Template deleted');
  }

  // ===== CATEGORIES =====

  async listCategories(templateId: number): Promise<Category[]> {
    await this.getTemplate(templateId);
    return this.store.listCategories(templateOwner(templateId));
  }

  async createCategory(templateId: number, input: { name: string; position: number }): Promise<Category> {
    await this.getTemplate(templateId);
    return this.store.createCategory({ owner: templateOwner(templateId), ...input });
  }

  async getCategory(id: number): Promise<Category> {
    const category = await this.store.getCategory(id);
    if (!category) throw NotFoundError.of('Category', id);
    return category;
  }

  async updateCategory(id: number, patch: CategoryPatch): Promise<Category> {
    const category = await this.store.updateCategory(id, patch);
    if (!category) throw NotFoundError.of('Category', id);
    return category;
  }

  async deleteCategory(id: number): Promise<void> {
    if (!(await this.store.deleteCategory(id))) throw NotFoundError.of('Category', id);
  }

  // ===== VARIABLES =====

  async listVariables(templateId: number): Promise<Variable[]> {
    await this.getTemplate(templateId);
    return this.store.listVariables(templateOwner(templateId));
  }

  async createVariable(templateId: number, input: CreateVariableParams): Promise<Variable> {
    await this.getTemplate(templateId);
    return this.store.createVariable({ owner: templateOwner(templateId), ...input });
  }

  async updateVariable(id: number, patch: VariablePatch): Promise<Variable> {
    const variable = await this.store.updateVariable(id, patch);
    if (!variable) throw NotFoundError.of('Variable', id);
    return variable;
  }

  async deleteVariable(id: number): Promise<void> {
    if (!(await this.store.deleteVariable(id))) throw NotFoundError.of('Variable', id);
  }

  // ===== ELEMENTS =====

  async listElements(categoryId: number): Promise<Element[]> {
    await this.getCategory(categoryId);
    return this.store.listElementsByCategory(categoryId);
  }

  /** The element belongs to whoever owns the category. */
  async createElement(categoryId: number, input: CreateElementParams): Promise<Element> {
    const category = await this.getCategory(categoryId);
    return this.store.createElement({ owner: category.owner, categoryId: category.id, ...input });
  }

  async updateElement(id: number, patch: ElementPatch): Promise<Element> {
    const element = await this.store.updateElement(id, patch);
    if (!element) throw NotFoundError.of('Element', id);
    return element;
  }

  async deleteElement(id: number): Promise<void> {
    if (!(await this.store.deleteElement(id))) throw NotFoundError.of('Element', id);
  }
}
