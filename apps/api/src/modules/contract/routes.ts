/**
 * Contract API Routes
 *
 * Endpoints:
 * - GET    /                      — List contracts (filter, search, sort, paginate)
 * - GET    /stats                 — Dashboard counters
 * - GET    /recent                — Most recently updated
 * - GET    /pending               — Awaiting action
 * - POST   /                      — Create contract (DRAFT)
 * - POST   /bulk-download         — ZIP of the latest content of several contracts
 * - GET    /:id                   — Detail with content, parties, signatures
 * - PATCH  /:id                   — Update title / metadata
 * - DELETE /:id                   — Soft delete
 * - POST   /:id/duplicate         — Copy into a new DRAFT
 * - PATCH  /:id/content           — Append a content version
 * - POST   /:id/generate          — Render the type's template, store as AI version
 * - GET    /:id/versions          — Version history
 * - PATCH  /:id/status            — Request a status transition
 * - GET    /:id/transitions       — Allowed next statuses
 * - GET    /:id/history           — Activity trail, newest first
 * - GET    /:id/parties           — Signing roster
 * - POST   /:id/parties           — Add party
 * - DELETE /:id/parties/:partyId  — Remove party
 * - GET    /:id/document          — PDF of the latest content
 * - GET    /:id/signatures        — Recorded signatures
 */

import { Router } from 'express';
import { z } from 'zod';
import {
  CONTRACT_SORT_FIELDS,
  CONTRACT_STATUSES,
  MAX_BULK_DOWNLOAD,
  MAX_IDENTITY_LENGTH,
  MAX_PAGE,
  MAX_PARTIES_PER_CONTRACT,
  MAX_TEMPLATE_ID_LENGTH,
  MAX_TITLE_LENGTH,
  PARTY_ROLES,
  VERSION_SOURCES,
} from '@quill/shared';
import { getIdentity } from '../../middleware/identity-context';
import {
  contractService,
  partyService,
  signatureService,
  templateService,
} from '../../services';
import { buildContractArchive } from '../document/archive';
import { renderContractDocument } from '../document/contract';
import { sendPdf, sendZip } from '../document/http';

export const contractRouter = Router();

const idParams = z.object({ id: z.string().uuid() });
const partyParams = idParams.extend({ partyId: z.string().uuid() });

const pageNumber = z.coerce.number().int().positive().max(MAX_PAGE);

const listQuerySchema = z.object({
  status: z.enum(CONTRACT_STATUSES).optional(),
  search: z.string().trim().max(200).optional(),
  templateId: z.string().min(1).max(MAX_TEMPLATE_ID_LENGTH).optional(),
  fromDate: z.string().max(40).optional(),
  toDate: z.string().max(40).optional(),
  page: pageNumber.optional(),
  // Larger sizes are capped by the service
  pageSize: pageNumber.optional(),
  sortBy: z.enum(CONTRACT_SORT_FIELDS).optional(),
  sortOrder: z.enum(['asc', 'desc']).optional(),
});

const metadataSchema = z.record(z.unknown());

const createContractSchema = z.object({
  title: z.string().max(MAX_TITLE_LENGTH),
  templateId: z.string().min(1).max(MAX_TEMPLATE_ID_LENGTH),
  contractType: z.string().min(1).max(MAX_TEMPLATE_ID_LENGTH),
  metadata: metadataSchema.optional(),
});

const updateContractSchema = z.object({
  title: z.string().max(MAX_TITLE_LENGTH).optional(),
  metadata: metadataSchema.optional(),
});

const contentSchema = z.object({
  content: z.string(),
  source: z.enum(VERSION_SOURCES).default('USER'),
});

const generateSchema = z.object({
  inputs: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
});

const statusSchema = z.object({
  status: z.enum(CONTRACT_STATUSES),
  reason: z.string().max(1000).optional(),
});

const addPartySchema = z.object({
  role: z.enum(PARTY_ROLES),
  name: z.string().max(MAX_IDENTITY_LENGTH),
  email: z.string().trim().max(MAX_IDENTITY_LENGTH).email(),
  order: z.number().int().positive().max(MAX_PARTIES_PER_CONTRACT).optional(),
});

const bulkDownloadSchema = z.object({
  contractIds: z.array(z.string().uuid()).min(1).max(MAX_BULK_DOWNLOAD),
});

// --- List Contracts ---
contractRouter.get('/', async (req, res, next) => {
  try {
    const identity = getIdentity(req);
    const query = listQuerySchema.parse(req.query);
    res.json(await contractService.listContracts(identity, query));
  } catch (err) {
    next(err);
  }
});

// --- Dashboard ---
contractRouter.get('/stats', async (req, res, next) => {
  try {
    res.json(await contractService.getStats(getIdentity(req)));
  } catch (err) {
    next(err);
  }
});

contractRouter.get('/recent', async (req, res, next) => {
  try {
    res.json(await contractService.getRecent(getIdentity(req)));
  } catch (err) {
    next(err);
  }
});

contractRouter.get('/pending', async (req, res, next) => {
  try {
    res.json(await contractService.getPending(getIdentity(req)));
  } catch (err) {
    next(err);
  }
});

// --- Create Contract ---
contractRouter.post('/', async (req, res, next) => {
  try {
    const identity = getIdentity(req);
    const input = createContractSchema.parse(req.body);
    const contract = await contractService.createContract(identity, input);
    res.status(201).json(contract);
  } catch (err) {
    next(err);
  }
});

// --- Bulk Download ---
contractRouter.post('/bulk-download', async (req, res, next) => {
  try {
    const identity = getIdentity(req);
    const { contractIds } = bulkDownloadSchema.parse(req.body);
    const contents = await contractService.getContents(identity, contractIds);
    sendZip(res, await buildContractArchive(contents), 'contracts.zip');
  } catch (err) {
    next(err);
  }
});

// --- Get Contract Detail ---
contractRouter.get('/:id', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    res.json(await contractService.getContract(getIdentity(req), id));
  } catch (err) {
    next(err);
  }
});

// --- Update Title / Metadata ---
contractRouter.patch('/:id', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    const input = updateContractSchema.parse(req.body);
    res.json(await contractService.updateContract(getIdentity(req), id, input));
  } catch (err) {
    next(err);
  }
});

// --- Soft Delete ---
contractRouter.delete('/:id', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    await contractService.deleteContract(getIdentity(req), id);
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

contractRouter.post('/:id/duplicate', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    const copy = await contractService.duplicateContract(getIdentity(req), id);
    res.status(201).json(copy);
  } catch (err) {
    next(err);
  }
});

// --- Content ---
contractRouter.patch('/:id/content', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    const { content, source } = contentSchema.parse(req.body);
    const result = await contractService.updateContent(getIdentity(req), id, content, source);
    res.json({ success: true, version: result.version });
  } catch (err) {
    next(err);
  }
});

contractRouter.post('/:id/generate', async (req, res, next) => {
  try {
    const identity = getIdentity(req);
    const { id } = idParams.parse(req.params);
    const { inputs } = generateSchema.parse(req.body);

    const contract = await contractService.getContract(identity, id);
    const html = templateService.render(contract.contractType, inputs);
    const result = await contractService.updateContent(identity, id, html, 'AI');

    res.json({ success: true, version: result.version, contract: result.contract });
  } catch (err) {
    next(err);
  }
});

contractRouter.get('/:id/versions', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    res.json(await contractService.getVersions(getIdentity(req), id));
  } catch (err) {
    next(err);
  }
});

// --- Lifecycle ---
contractRouter.patch('/:id/status', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    const { status, reason } = statusSchema.parse(req.body);
    res.json(await contractService.requestTransition(getIdentity(req), id, status, reason));
  } catch (err) {
    next(err);
  }
});

contractRouter.get('/:id/transitions', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    res.json(await contractService.getTransitions(getIdentity(req), id));
  } catch (err) {
    next(err);
  }
});

contractRouter.get('/:id/history', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    res.json(await contractService.getHistory(getIdentity(req), id));
  } catch (err) {
    next(err);
  }
});

// --- Parties ---
contractRouter.get('/:id/parties', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    res.json(await partyService.listParties(getIdentity(req), id));
  } catch (err) {
    next(err);
  }
});

contractRouter.post('/:id/parties', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    const input = addPartySchema.parse(req.body);
    const party = await partyService.addParty(getIdentity(req), id, input);
    res.status(201).json(party);
  } catch (err) {
    next(err);
  }
});

contractRouter.delete('/:id/parties/:partyId', async (req, res, next) => {
  try {
    const { id, partyId } = partyParams.parse(req.params);
    await partyService.removeParty(getIdentity(req), id, partyId);
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

// --- Document & Signatures ---
contractRouter.get('/:id/document', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    const contract = await contractService.getContract(getIdentity(req), id);
    sendPdf(res, await renderContractDocument(contract), `contract-${id}.pdf`);
  } catch (err) {
    next(err);
  }
});

contractRouter.get('/:id/signatures', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    res.json(await signatureService.listSignatures(getIdentity(req), id));
  } catch (err) {
    next(err);
  }
});
