export type SigningRole = 'client' | 'contractor';

export const SIGNING_ROLES: readonly SigningRole[] = ['client', 'contractor'];

export interface Contract {
  id: number;
  proposalId: number;
  isActive: boolean;
  version: number;
  clientName: string;
  clientSignature: string | null;
  clientInitials: string;
  clientSignedAt: Date | null;
  contractorName: string;
  contractorSignature: string | null;
  contractorInitials: string;
  contractorSignedAt: Date | null;
  termsAndConditions: string;
  createdAt: Date;
}

export interface ContractParties {
  clientName: string;
  clientInitials: string;
  contractorName: string;
  contractorInitials: string;
  termsAndConditions: string;
}

export type NewContract = ContractParties & Pick<Contract, 'proposalId' | 'isActive' | 'version'>;

export type ContractPatch = Partial<
  Pick<
    Contract,
    | 'isActive'
    | 'clientSignature'
    | 'clientInitials'
    | 'clientSignedAt'
    | 'contractorSignature'
    | 'contractorInitials'
    | 'contractorSignedAt'
  >
>;

export interface SignatureInput {
  /** Raw image bytes; replaces the stored signature when present. */
  signature?: Buffer;
  /** File extension for the stored signature, without the dot. Defaults to png. */
  signatureExtension?: string;
  /** Replaces the stored initials when non-empty. */
  initials?: string;
}
