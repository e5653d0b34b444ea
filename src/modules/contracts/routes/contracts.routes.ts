/**
 * CONTRACT ROUTES
 * Contract generation from a proposal, reads, deletion and the two signing
 * flows (JSON body with a base64 signature, or a multipart upload).
 */

import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../../../services/container';
import { SIGNING_ROLES, type SignatureInput } from '../../../types/contract.types';
import { ValidationError } from '../../../utils/errors';
import { idParams } from '../../../utils/route-schemas';
import { presentContract } from '../contract.presenters';
import { decodeSignature, extensionOf } from '../signature-payload';

interface GenerateContractBody {
  client_name: string;
  client_initials?: string;
  contractor_name: string;
  contractor_initials?: string;
  terms_and_conditions: string;
}

interface SignatureBody {
  signature?: string;
  initials?: string;
}

const initialsProperty = { type: 'string', maxLength: 10 } as const;

export async function registerContractRoutes(fastify: FastifyInstance, services: AppServices) {
  const { contracts } = services;

  fastify.post<{ Params: { proposalId: number }; Body: GenerateContractBody }>('/proposals/:proposalId/generate-contract', {
    schema: {
      tags: ['contracts'],
      summary: 'Generate the next contract version for a proposal',
      params: idParams('proposalId'),
      body: {
        type: 'object',
        required: ['client_name', 'contractor_name', 'terms_and_conditions'],
        properties: {
          client_name: { type: 'string', minLength: 1, maxLength: 255 },
          client_initials: initialsProperty,
          contractor_name: { type: 'string', minLength: 1, maxLength: 255 },
          contractor_initials: initialsProperty,
          terms_and_conditions: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const contract = await contracts.generateContract(request.params.proposalId, {
      clientName: request.body.client_name,
      clientInitials: request.body.client_initials ?? '',
      contractorName: request.body.contractor_name,
      contractorInitials: request.body.contractor_initials ?? '',
      termsAndConditions: request.body.terms_and_conditions,
    });
    return reply.status(201).send({ success: true, contract: presentContract(contract) });
  });

  fastify.get<{ Querystring: { proposal_id?: number } }>('/contracts', {
    schema: {
      tags: ['contracts'],
      summary: 'List contracts, optionally for one proposal',
      querystring: {
        type: 'object',
        properties: { proposal_id: { type: 'integer', minimum: 1 } },
      },
    },
  }, async (request) => {
    const list = await contracts.listContracts(request.query.proposal_id);
    return { success: true, contracts: list.map(presentContract) };
  });

  fastify.get<{ Params: { contractId: number } }>('/contracts/:contractId', {
    schema: { tags: ['contracts'], summary: 'Get a contract', params: idParams('contractId') },
  }, async (request) => {
    const contract = await contracts.getContract(request.params.contractId);
    return { success: true, contract: presentContract(contract) };
  });

  fastify.delete<{ Params: { contractId: number } }>('/contracts/:contractId', {
    schema: { tags: ['contracts'], summary: 'Delete a contract and its signatures', params: idParams('contractId') },
  }, async (request) => {
    await contracts.deleteContract(request.params.contractId);
    return { success: true };
  });

  // ===== SIGNING =====

  for (const role of SIGNING_ROLES) {
    fastify.put<{ Params: { contractId: number }; Body: SignatureBody | undefined }>(`/contracts/:contractId/${role}-sign`, {
      schema: {
        tags: ['contracts'],
        summary: `Sign as ${role} (base64 or data URL signature)`,
        params: idParams('contractId'),
        body: {
          type: 'object',
          properties: {
            signature: { type: 'string' },
            initials: initialsProperty,
          },
        },
      },
    }, async (request) => {
      const decoded = decodeSignature(request.body?.signature);
      const contract = await contracts.sign(request.params.contractId, role, {
        signature: decoded?.bytes,
        signatureExtension: decoded?.extension,
        initials: request.body?.initials,
      });
      return { success: true, contract: presentContract(contract) };
    });

    fastify.post<{ Params: { contractId: number } }>(`/contracts/:contractId/${role}-sign/upload`, {
      schema: {
        tags: ['contracts'],
        summary: `Sign as ${role} with an uploaded signature image`,
        consumes: ['multipart/form-data'],
        params: idParams('contractId'),
      },
    }, async (request) => {
      if (!request.isMultipart()) {
        throw new ValidationError('Expected a multipart/form-data request');
      }

      const input: SignatureInput = {};
      for await (const part of request.parts()) {
        if (part.type === 'file') {
          const bytes = await part.toBuffer();
          if (part.fieldname === 'signature' && bytes.length > 0) {
            input.signature = bytes;
            input.signatureExtension = extensionOf(part.filename);
          }
        } else if (part.fieldname === 'initials' && typeof part.value === 'string') {
          if (part.value.length > 10) {
            throw new ValidationError('initials must be at most 10 characters');
          }
          input.initials = part.value;
        }
      }

      request.log.info({ contractId: request.params.contractId, role, hasSignature: Boolean(input.signature) }, '[Contracts] Signature upload received');
      const contract = await contracts.sign(request.params.contractId, role, input);
      return { success: true, contract: presentContract(contract) };
    });
  }
}
