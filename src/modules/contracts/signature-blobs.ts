import type { BlobStore } from '../../services/blob-storage.service';
import type { Contract } from '../../types/contract.types';
import { errorMessage } from '../../utils/errors';
import type { Logger } from '../../utils/logger';

/**
 * Remove a stored signature. A blob that cannot be removed is logged and left
 * behind; it never fails the record mutation.
 */
export async function discardSignatureBlob(
  blobs: BlobStore,
  logger: Logger,
  blobPath: string,
  contractId: number,
): Promise<void> {
  try {
    await blobs.delete(blobPath);
  } catch (error) {
    logger.warn({ contractId, blobPath, err: error }, `[Contracts] Could not delete signature blob: ${errorMessage(error)}`);
  }
}

export async function discardContractSignatures(
  blobs: BlobStore,
  logger: Logger,
  contract: Pick<Contract, 'id' | 'clientSignature' | 'contractorSignature'>,
): Promise<void> {
  for (const blobPath of [contract.clientSignature, contract.contractorSignature]) {
    if (blobPath) await discardSignatureBlob(blobs, logger, blobPath, contract.id);
  }
}
