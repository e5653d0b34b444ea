import type { ProposalStore } from '../../../store/proposal-store';
import type { BlobStore } from '../../../services/blob-storage.service';
import { discardContractSignatures } from '../../contracts/signature-blobs';
import {
  proposalOwner,
  type Category,
  type Element,
  type Proposal,
  type ProposalPatch,
  type Variable,
} from '../../../types/proposal.types';
import { NotFoundError } from '../../../utils/errors';
import type { Logger } from '../../../utils/logger';

export class ProposalService {
  constructor(
    private readonly store: ProposalStore,
    private readonly blobs: BlobStore,
    private readonly logger: Logger,
  ) {}

  listProposals(): Promise<Proposal[]> {
    return this.store.listProposals();
  }

  async getProposal(id: number): Promise<Proposal> {
    const proposal = await this.store.getProposal(id);
    if (!proposal) throw NotFoundError.of('Proposal', id);
    return proposal;
  }

  async updateProposal(id: number, patch: ProposalPatch): Promise<Proposal> {
    const proposal = await this.store.updateProposal(id, patch);
    if (!proposal) throw NotFoundError.of('Proposal', id);
    return proposal;
  }

  /**
   * Removes the proposal with its values, direct structure and contracts.
   * Signature blobs of those contracts are removed best-effort afterwards.
   */
  async deleteProposal(id: number): Promise<void> {
    const contracts = await this.store.listContracts({ proposalId: id });
    if (!(await this.store.deleteProposal(id))) throw NotFoundError.of('Proposal', id);

    for (const contract of contracts) {
      await discardContractSignatures(this.blobs, this.logger, contract);
    }
    this.logger.info({ proposalId: id, contracts: contracts.length }, '[Proposals] Proposal deleted');
  }

  async listCategories(id: number): Promise<Category[]> {
    await this.getProposal(id);
    return this.store.listCategories(proposalOwner(id));
  }

  async listVariables(id: number): Promise<Variable[]> {
    await this.getProposal(id);
    return this.store.listVariables(proposalOwner(id));
  }

  async listElements(id: number): Promise<Element[]> {
    await this.getProposal(id);
    return this.store.listElements(proposalOwner(id));
  }
}
