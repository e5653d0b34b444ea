/**
 * Template Catalog Routes
 * Templates and the categories, variables and elements they own.
 */

import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../../../services/container';
import { VARIABLE_TYPES, type VariableType } from '../../../types/proposal.types';
import { idParams, measurementProperty, percentageProperty } from '../../../utils/route-schemas';
import { presentCategory, presentElement, presentTemplate, presentVariable } from '../template.presenters';

interface TemplateBody {
  name: string;
  description?: string;
}

interface CategoryBody {
  name: string;
  position?: number;
}

interface VariableBody {
  name: string;
  type: VariableType;
  default_value?: number;
}

interface ElementBody {
  name: string;
  material_cost: string;
  labor_cost: string;
  markup_percentage?: number;
  position?: number;
}

const templateBody = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 255 },
    description: { type: 'string', default: '' },
  },
} as const;

const categoryBody = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 255 },
    position: { type: 'integer', default: 0 },
  },
} as const;

const variableBody = {
  type: 'object',
  required: ['name', 'type'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 255 },
    type: { type: 'string', enum: [...VARIABLE_TYPES] },
    default_value: measurementProperty,
  },
} as const;

const elementBody = {
  type: 'object',
  required: ['name', 'material_cost', 'labor_cost'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 255 },
    material_cost: { type: 'string', maxLength: 255 },
    labor_cost: { type: 'string', maxLength: 255 },
    markup_percentage: { ...percentageProperty, default: 0 },
    position: { type: 'integer', default: 0 },
  },
} as const;

export async function registerTemplateRoutes(fastify: FastifyInstance, services: AppServices) {
  const { catalog } = services;

  // ===== TEMPLATES =====

  fastify.get('/templates', {
    schema: { tags: ['templates'], summary: 'List templates' },
  }, async () => {
    const templates = await catalog.listTemplates();
    return { success: true, templates: templates.map(presentTemplate) };
  });

  fastify.post<{ Body: TemplateBody }>('/templates', {
    schema: { tags: ['templates'], summary: 'Create a template', body: templateBody },
  }, async (request, reply) => {
    const template = await catalog.createTemplate({
      name: request.body.name,
      description: request.body.description ?? '',
    });
    return reply.status(201).send({ success: true, template: presentTemplate(template) });
  });

  fastify.get<{ Params: { templateId: number } }>('/templates/:templateId', {
    schema: { tags: ['templates'], summary: 'Get a template', params: idParams('templateId') },
  }, async (request) => {
    const template = await catalog.getTemplate(request.params.templateId);
    return { success: true, template: presentTemplate(template) };
  });

  fastify.put<{ Params: { templateId: number }; Body: TemplateBody }>('/templates/:templateId', {
    schema: { tags: ['templates'], summary: 'Update a template', params: idParams('templateId'), body: templateBody },
  }, async (request) => {
    const template = await catalog.updateTemplate(request.params.templateId, {
      name: request.body.name,
      description: request.body.description ?? '',
    });
    return { success: true, template: presentTemplate(template) };
  });

  fastify.delete<{ Params: { templateId: number } }>('/templates/:templateId', {
    schema: { tags: ['templates'], summary: 'Delete a template', params: idParams('templateId') },
  }, async (request) => {
    await catalog.deleteTemplate(request.params.templateId);
    return { success: true };
  });

  // ===== CATEGORIES =====

  fastify.get<{ Params: { templateId: number } }>('/templates/:templateId/categories', {
    schema: { tags: ['templates'], summary: 'List template categories', params: idParams('templateId') },
  }, async (request) => {
    const categories = await catalog.listCategories(request.params.templateId);
    return { success: true, categories: categories.map(presentCategory) };
  });

  fastify.post<{ Params: { templateId: number }; Body: CategoryBody }>('/templates/:templateId/categories', {
    schema: { tags: ['templates'], summary: 'Create a template category', params: idParams('templateId'), body: categoryBody },
  }, async (request, reply) => {
    const category = await catalog.createCategory(request.params.templateId, {
      name: request.body.name,
      position: request.body.position ?? 0,
    });
    return reply.status(201).send({ success: true, category: presentCategory(category) });
  });

  fastify.put<{ Params: { categoryId: number }; Body: CategoryBody }>('/categories/:categoryId', {
    schema: { tags: ['templates'], summary: 'Update a category', params: idParams('categoryId'), body: categoryBody },
  }, async (request) => {
    const category = await catalog.updateCategory(request.params.categoryId, {
      name: request.body.name,
      position: request.body.position ?? 0,
    });
    return { success: true, category: presentCategory(category) };
  });

  fastify.delete<{ Params: { categoryId: number } }>('/categories/:categoryId', {
    schema: { tags: ['templates'], summary: 'Delete a category', params: idParams('categoryId') },
  }, async (request) => {
    await catalog.deleteCategory(request.params.categoryId);
    return { success: true };
  });

  // ===== VARIABLES =====

  fastify.get<{ Params: { templateId: number } }>('/templates/:templateId/variables', {
    schema: { tags: ['templates'], summary: 'List template variables', params: idParams('templateId') },
  }, async (request) => {
    const variables = await catalog.listVariables(request.params.templateId);
    return { success: true, variables: variables.map(presentVariable) };
  });

  fastify.post<{ Params: { templateId: number }; Body: VariableBody }>('/templates/:templateId/variables', {
    schema: { tags: ['templates'], summary: 'Create a template variable', params: idParams('templateId'), body: variableBody },
  }, async (request, reply) => {
    const variable = await catalog.createVariable(request.params.templateId, {
      name: request.body.name,
      type: request.body.type,
      defaultValue: request.body.default_value ?? 0,
    });
    return reply.status(201).send({ success: true, variable: presentVariable(variable) });
  });

  fastify.put<{ Params: { variableId: number }; Body: VariableBody }>('/variables/:variableId', {
    schema: { tags: ['templates'], summary: 'Update a variable', params: idParams('variableId'), body: variableBody },
  }, async (request) => {
    const variable = await catalog.updateVariable(request.params.variableId, {
      name: request.body.name,
      type: request.body.type,
      defaultValue: request.body.default_value,
    });
    return { success: true, variable: presentVariable(variable) };
  });

  fastify.delete<{ Params: { variableId: number } }>('/variables/:variableId', {
    schema: { tags: ['templates'], summary: 'Delete a variable', params: idParams('variableId') },
  }, async (request) => {
    await catalog.deleteVariable(request.params.variableId);
    return { success: true };
  });

  // ===== ELEMENTS =====

  fastify.get<{ Params: { categoryId: number } }>('/categories/:categoryId/elements', {
    schema: { tags: ['templates'], summary: 'List category elements', params: idParams('categoryId') },
  }, async (request) => {
    const elements = await catalog.listElements(request.params.categoryId);
    return { success: true, elements: elements.map(presentElement) };
  });

  fastify.post<{ Params: { categoryId: number }; Body: ElementBody }>('/categories/:categoryId/elements', {
    schema: { tags: ['templates'], summary: 'Create an element in a category', params: idParams('categoryId'), body: elementBody },
  }, async (request, reply) => {
    const element = await catalog.createElement(request.params.categoryId, {
      name: request.body.name,
      materialCost: request.body.material_cost,
      laborCost: request.body.labor_cost,
      markupPercentage: request.body.markup_percentage ?? 0,
      position: request.body.position ?? 0,
    });
    return reply.status(201).send({ success: true, element: presentElement(element) });
  });

  fastify.put<{ Params: { elementId: number }; Body: ElementBody }>('/elements/:elementId', {
    schema: { tags: ['templates'], summary: 'Update an element', params: idParams('elementId'), body: elementBody },
  }, async (request) => {
    const element = await catalog.updateElement(request.params.elementId, {
      name: request.body.name,
      materialCost: request.body.material_cost,
      laborCost: request.body.labor_cost,
      markupPercentage: request.body.markup_percentage ?? 0,
      position: request.body.position ?? 0,
    });
    return { success: true, element: presentElement(element) };
  });

  fastify.delete<{ Params: { elementId: number } }>('/elements/:elementId', {
    schema: { tags: ['templates'], summary: 'Delete an element', params: idParams('elementId') },
  }, async (request) => {
    await catalog.deleteElement(request.params.elementId);
    return { success: true };
  });
}
