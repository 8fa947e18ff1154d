/**
 * Service singletons wired to the PostgreSQL store.
 * Routes import from here; tests mock this module.
 */

import { config } from '../shared/config';
import { db } from '../shared/db';
import { DrizzleContractStore } from '../store/drizzle-store';
import { eventBus } from '../events/bus';
import { ContractLifecycleService } from '../modules/contract/service';
import { PartyCoordinator } from '../modules/contract/parties';
import { SignatureCoordinator } from '../modules/signature/service';
import { AuditProjection } from '../modules/audit/service';
import { TemplateCatalogService } from '../modules/template/service';
import { UserAccountService } from '../modules/user/service';

export const contractStore = new DrizzleContractStore(db);

export const contractService = new ContractLifecycleService(contractStore, eventBus);
export const partyService = new PartyCoordinator(contractStore);
export const signatureService = new SignatureCoordinator(contractStore, partyService, eventBus, {
  frontendUrl: config.FRONTEND_URL,
});
export const auditService = new AuditProjection(contractStore);
export const templateService = new TemplateCatalogService();
export const userService = new UserAccountService(contractStore);
