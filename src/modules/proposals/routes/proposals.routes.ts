/**
 * Proposal Routes
 * Creating proposals (from a template or empty), reading their structure and
 * pulling later template changes into them.
 */

import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../../../services/container';
import { idParams, percentageProperty } from '../../../utils/route-schemas';
import { presentCategory, presentElement, presentVariable } from '../../templates/template.presenters';
import { presentProposal, presentSyncResult } from '../proposal.presenters';

interface FromTemplateBody {
  template_id: number;
  name: string;
  global_markup_percentage?: number;
}

interface FromScratchBody {
  name: string;
  global_markup_percentage?: number;
}

interface ProposalUpdateBody {
  name?: string;
  global_markup_percentage?: number;
}

export async function registerProposalRoutes(fastify: FastifyInstance, services: AppServices) {
  const { proposals, cloning, sync } = services;

  fastify.get('/proposals', {
    schema: { tags: ['proposals'], summary: 'List proposals' },
  }, async () => {
    const list = await proposals.listProposals();
    return { success: true, proposals: list.map(presentProposal) };
  });

  fastify.post<{ Body: FromTemplateBody }>('/proposals/from-template', {
    schema: {
      tags: ['proposals'],
      summary: 'Create a proposal from a template',
      body: {
        type: 'object',
        required: ['template_id', 'name'],
        properties: {
          template_id: { type: 'integer', minimum: 1 },
          name: { type: 'string', minLength: 1, maxLength: 255 },
          global_markup_percentage: percentageProperty,
        },
      },
    },
  }, async (request, reply) => {
    const proposal = await cloning.instantiateProposalFromTemplate({
      templateId: request.body.template_id,
      name: request.body.name,
      globalMarkupPercentage: request.body.global_markup_percentage ?? 0,
    });
    return reply.status(201).send({ success: true, proposal: presentProposal(proposal) });
  });

  fastify.post<{ Body: FromScratchBody }>('/proposals/from-scratch', {
    schema: {
      tags: ['proposals'],
      summary: 'Create an empty proposal',
      body: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string', minLength: 1, maxLength: 255 },
          global_markup_percentage: percentageProperty,
        },
      },
    },
  }, async (request, reply) => {
    const proposal = await cloning.createProposalFromScratch({
      name: request.body.name,
      globalMarkupPercentage: request.body.global_markup_percentage ?? 0,
    });
    return reply.status(201).send({ success: true, proposal: presentProposal(proposal) });
  });

  fastify.get<{ Params: { proposalId: number } }>('/proposals/:proposalId', {
    schema: { tags: ['proposals'], summary: 'Get a proposal', params: idParams('proposalId') },
  }, async (request) => {
    const proposal = await proposals.getProposal(request.params.proposalId);
    return { success: true, proposal: presentProposal(proposal) };
  });

  fastify.put<{ Params: { proposalId: number }; Body: ProposalUpdateBody }>('/proposals/:proposalId', {
    schema: {
      tags: ['proposals'],
      summary: 'Rename a proposal or change its markup',
      params: idParams('proposalId'),
      body: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1, maxLength: 255 },
          global_markup_percentage: percentageProperty,
        },
      },
    },
  }, async (request) => {
    const proposal = await proposals.updateProposal(request.params.proposalId, {
      ...(request.body.name !== undefined && { name: request.body.name }),
      ...(request.body.global_markup_percentage !== undefined && {
        globalMarkupPercentage: request.body.global_markup_percentage,
      }),
    });
    return { success: true, proposal: presentProposal(proposal) };
  });

  fastify.delete<{ Params: { proposalId: number } }>('/proposals/:proposalId', {
    schema: { tags: ['proposals'], summary: 'Delete a proposal', params: idParams('proposalId') },
  }, async (request) => {
    await proposals.deleteProposal(request.params.proposalId);
    return { success: true };
  });

  // ===== STRUCTURE =====

  fastify.get<{ Params: { proposalId: number } }>('/proposals/:proposalId/categories', {
    schema: { tags: ['proposals'], summary: 'Categories owned by a proposal', params: idParams('proposalId') },
  }, async (request) => {
    const categories = await proposals.listCategories(request.params.proposalId);
    return { success: true, categories: categories.map(presentCategory) };
  });

  fastify.get<{ Params: { proposalId: number } }>('/proposals/:proposalId/variables', {
    schema: { tags: ['proposals'], summary: 'Variables owned by a proposal', params: idParams('proposalId') },
  }, async (request) => {
    const variables = await proposals.listVariables(request.params.proposalId);
    return { success: true, variables: variables.map(presentVariable) };
  });

  fastify.get<{ Params: { proposalId: number } }>('/proposals/:proposalId/elements', {
    schema: { tags: ['proposals'], summary: 'Elements owned by a proposal', params: idParams('proposalId') },
  }, async (request) => {
    const elements = await proposals.listElements(request.params.proposalId);
    return { success: true, elements: elements.map(presentElement) };
  });

  // ===== TEMPLATE SYNC =====

  fastify.post<{ Params: { proposalId: number } }>('/proposals/:proposalId/sync-template', {
    schema: {
      tags: ['proposals'],
      summary: 'Pull template changes into a proposal',
      params: idParams('proposalId'),
    },
  }, async (request) => {
    const result = await sync.syncProposalWithTemplate(request.params.proposalId);
    return { success: true, ...presentSyncResult(result) };
  });
}
