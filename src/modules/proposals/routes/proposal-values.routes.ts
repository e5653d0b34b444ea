/**
 * Proposal Value Routes
 * Batch edits of variable and element values. A batch is applied as a whole
 * or not at all.
 */

import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../../../services/container';
import { idParams } from '../../../utils/route-schemas';
import { presentElementValue, presentVariableValue } from '../proposal.presenters';
import {
  elementValueItemSchema,
  toElementValueInput,
  toVariableValueInput,
  variableValueItemSchema,
  type ElementValueItem,
  type VariableValueItem,
} from '../value-requests';

export async function registerProposalValueRoutes(fastify: FastifyInstance, services: AppServices) {
  const { values } = services;

  fastify.get<{ Params: { proposalId: number } }>('/proposals/:proposalId/variable-values', {
    schema: { tags: ['values'], summary: 'Variable values of a proposal', params: idParams('proposalId') },
  }, async (request) => {
    const resolved = await values.getVariableValues(request.params.proposalId);
    return { success: true, variable_values: resolved.map(presentVariableValue) };
  });

  fastify.post<{ Params: { proposalId: number }; Body: { variable_values: VariableValueItem[] } }>(
    '/proposals/:proposalId/variable-values',
    {
      schema: {
        tags: ['values'],
        summary: 'Set variable values, creating proposal variables inline',
        params: idParams('proposalId'),
        body: {
          type: 'object',
          required: ['variable_values'],
          properties: { variable_values: { type: 'array', items: variableValueItemSchema } },
        },
      },
    },
    async (request) => {
      const items = request.body.variable_values.map(toVariableValueInput);
      const resolved = await values.setVariableValues(request.params.proposalId, items);
      return { success: true, variable_values: resolved.map(presentVariableValue) };
    },
  );

  fastify.get<{ Params: { proposalId: number } }>('/proposals/:proposalId/element-values', {
    schema: { tags: ['values'], summary: 'Element values of a proposal with totals', params: idParams('proposalId') },
  }, async (request) => {
    const resolved = await values.getElementValues(request.params.proposalId);
    return { success: true, element_values: resolved.map(presentElementValue) };
  });

  fastify.post<{ Params: { proposalId: number }; Body: { element_values: ElementValueItem[] } }>(
    '/proposals/:proposalId/element-values',
    {
      schema: {
        tags: ['values'],
        summary: 'Update element values, creating proposal elements inline',
        params: idParams('proposalId'),
        body: {
          type: 'object',
          required: ['element_values'],
          properties: { element_values: { type: 'array', items: elementValueItemSchema } },
        },
      },
    },
    async (request) => {
      const items = request.body.element_values.map(toElementValueInput);
      const resolved = await values.updateElementValues(request.params.proposalId, items);
      return { success: true, element_values: resolved.map(presentElementValue) };
    },
  );
}
