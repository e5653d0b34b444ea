import type { ProposalStore } from '../store/proposal-store';
import type { Logger } from '../utils/logger';
import type { BlobStore } from './blob-storage.service';
import type { Clock } from './clock';
import { TemplateCatalogService } from '../modules/templates/services/template-catalog.service';
import { ProposalService } from '../modules/proposals/services/proposal.service';
import { TemplateCloningService } from '../modules/proposals/services/template-cloning.service';
import { ValueResolverService } from '../modules/proposals/services/value-resolver.service';
import { TemplateSyncService } from '../modules/proposals/services/template-sync.service';
import { ContractService } from '../modules/contracts/services/contract.service';

export interface AppDependencies {
  store: ProposalStore;
  blobs: BlobStore;
  clock: Clock;
  /** Database liveness probe for /health/db; absent when no database is wired. */
  verifyDb?: () => Promise<boolean>;
}

export interface AppServices {
  catalog: TemplateCatalogService;
  proposals: ProposalService;
  cloning: TemplateCloningService;
  values: ValueResolverService;
  sync: TemplateSyncService;
  contracts: ContractService;
}

export function createServices(deps: AppDependencies, logger: Logger): AppServices {
  const { store, blobs, clock } = deps;
  return {
    catalog: new TemplateCatalogService(store, logger),
    proposals: new ProposalService(store, blobs, logger),
    cloning: new TemplateCloningService(store, logger),
    values: new ValueResolverService(store, logger),
    sync: new TemplateSyncService(store, logger),
    contracts: new ContractService(store, blobs, clock, logger),
  };
}
