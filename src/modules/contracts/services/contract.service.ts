/**
 * Contract Service
 * Generates contract versions for a proposal and records signatures.
 */

import type { ProposalStore } from '../../../store/proposal-store';
import type { BlobStore } from '../../../services/blob-storage.service';
import type { Clock } from '../../../services/clock';
import type {
  Contract,
  ContractParties,
  ContractPatch,
  SignatureInput,
  SigningRole,
} from '../../../types/contract.types';
import { NotFoundError } from '../../../utils/errors';
import type { Logger } from '../../../utils/logger';
import { currentVersion, planPromotion } from '../contract-versioning';
import { discardContractSignatures, discardSignatureBlob } from '../signature-blobs';

export class ContractService {
  constructor(
    private readonly store: ProposalStore,
    private readonly blobs: BlobStore,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  /**
   * Create the next contract version for a proposal and make it current.
   * The proposal row is locked so concurrent generations get distinct versions.
   */
  async generateContract(proposalId: number, parties: ContractParties): Promise<Contract> {
    const { contract, superseded } = await this.store.transaction(async tx => {
      const proposal = await tx.lockProposal(proposalId);
      if (!proposal) {
        throw NotFoundError.of('Proposal', proposalId);
      }

      const history = await tx.listContracts({ proposalId });
      const plan = planPromotion(history);
      await tx.deactivateContracts(plan.demote);

      const created = await tx.createContract({
        ...parties,
        proposalId,
        version: plan.version,
        isActive: true,
      });
      return { contract: created, superseded: currentVersion(history)?.version ?? null };
    });

    this.logger.info(
      { proposalId, contractId: contract.id, version: contract.version, supersededVersion: superseded },
      '[Contracts] Contract version generated',
    );
    return contract;
  }

  listContracts(proposalId?: number): Promise<Contract[]> {
    return this.store.listContracts(proposalId === undefined ? {} : { proposalId });
  }

  async getContract(id: number): Promise<Contract> {
    const contract = await this.store.getContract(id);
    if (!contract) throw NotFoundError.of('Contract', id);
    return contract;
  }

  /**
   * Record a signature for one party. The signing time is stamped on every
   * call; signature and initials are replaced only when supplied.
   */
  async sign(contractId: number, role: SigningRole, input: SignatureInput = {}): Promise<Contract> {
    const contract = await this.getContract(contractId);
    const previousSignature = role === 'client' ? contract.clientSignature : contract.contractorSignature;

    let signaturePath: string | undefined;
    if (input.signature) {
      const extension = input.signatureExtension ?? 'png';
      signaturePath = await this.blobs.save(`signatures/contract-${contractId}-${role}.${extension}`, input.signature);
    }

    const signedAt = this.clock.now();
    const patch: ContractPatch = role === 'client'
      ? {
          clientSignedAt: signedAt,
          ...(signaturePath ? { clientSignature: signaturePath } : {}),
          ...(input.initials ? { clientInitials: input.initials } : {}),
        }
      : {
          contractorSignedAt: signedAt,
          ...(signaturePath ? { contractorSignature: signaturePath } : {}),
          ...(input.initials ? { contractorInitials: input.initials } : {}),
        };

    const updated = await this.store.updateContract(contractId, patch);
    if (!updated) {
      if (signaturePath) await discardSignatureBlob(this.blobs, this.logger, signaturePath, contractId);
      throw NotFoundError.of('Contract', contractId);
    }

    // A blob store may hand back the same path for a same-type replacement
    if (signaturePath && previousSignature && previousSignature !== signaturePath) {
      await discardSignatureBlob(this.blobs, this.logger, previousSignature, contractId);
    }

    this.logger.info({ contractId, role, signedAt }, '[Contracts] Contract signed');
    return updated;
  }

  /**
   * Delete a contract. Attached signature blobs are removed best-effort first;
   * a blob that cannot be removed does not block the deletion.
   */
  async deleteContract(id: number): Promise<void> {
    const contract = await this.getContract(id);

    await discardContractSignatures(this.blobs, this.logger, contract);

    if (!(await this.store.deleteContract(id))) {
      throw NotFoundError.of('Contract', id);
    }
    this.logger.info({ contractId: id, proposalId: contract.proposalId }, '[Contracts] Contract deleted');
  }
}
