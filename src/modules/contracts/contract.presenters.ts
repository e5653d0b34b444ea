import type { Contract } from '../../types/contract.types';

const iso = (value: Date | null) => (value ? value.toISOString() : null);

export function presentContract(contract: Contract) {
  return {
    id: contract.id,
    proposal_id: contract.proposalId,
    is_active: contract.isActive,
    version: contract.version,
    client_name: contract.clientName,
    client_signature: contract.clientSignature,
    client_initials: contract.clientInitials,
    client_signed_at: iso(contract.clientSignedAt),
    contractor_name: contract.contractorName,
    contractor_signature: contract.contractorSignature,
    contractor_initials: contract.contractorInitials,
    contractor_signed_at: iso(contract.contractorSignedAt),
    terms_and_conditions: contract.termsAndConditions,
    created_at: contract.createdAt.toISOString(),
  };
}
