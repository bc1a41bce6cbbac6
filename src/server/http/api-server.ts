import http, { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import type { BillingMode } from '../../shared/bills';
import type { StaffMemberDto, Vendor } from '../../shared/vendors';
import { createConsoleAuditLog, type AuditLog } from '../audit-log';
import type { BillIngestor } from '../billing/bill-ingestor';
import { toBillEnvelopes } from '../billing/bill-schemas';
import type { SequenceGenerator } from '../billing/sequence-generator';
import type { SyncReconciler } from '../catalog/sync-reconciler';
import { ForbiddenError, NotFoundError, PosSyncError, UnauthorizedError, ValidationError, errorStatus, toErrorBody } from '../errors';
import { createConsoleLogger, type Logger } from '../logger';
import { parseOrThrow } from '../validation';
import { toVendorProfileDto } from '../vendors/vendor-dto';
import type { VendorRepository } from '../vendors/vendor-repository';
import {
  staffMemberSchema,
  toNewVendor,
  toProfilePatch,
  vendorProfilePatchSchema,
  vendorRegistrationSchema,
} from '../vendors/vendor-schemas';
import { createHeaderAuthenticator, type RequestAuthenticator } from './authenticator';
import { DEFAULT_MAX_BODY_BYTES, readJsonBody, sendJson, setCors } from './http-utils';

export interface ApiServices {
  vendors: VendorRepository;
  reconciler: SyncReconciler;
  ingestor: BillIngestor;
  sequence: SequenceGenerator;
}

export interface ApiServerOptions {
  maxBodyBytes?: number;
  authenticator?: RequestAuthenticator;
  logger?: Logger;
  audit?: AuditLog;
}

interface RequestContext {
  req: IncomingMessage;
  res: ServerResponse;
  url: URL;
  path: string;
  signal: AbortSignal;
}

interface Caller {
  userId: string;
  vendor: Vendor;
  isOwner: boolean;
}

const numberingPatchSchema = z.object({
  prefix: z.string().max(20).nullable().optional(),
  starting_number: z.number().int().optional(),
});

const BILL_PATH = /^\/bills\/([^/]+)$/;
const STAFF_PATH = /^\/vendor\/staff\/([^/]+)$/;

function queryValue(url: URL, name: string): string | null {
  const value = url.searchParams.get(name);
  return value === null || value.trim() === '' ? null : value.trim();
}

function readBillingMode(url: URL): BillingMode | null {
  const value = queryValue(url, 'billing_mode');
  if (value === null) return null;
  if (value !== 'gst' && value !== 'non_gst') {
    throw new ValidationError('billing_mode must be gst or non_gst.', { field: 'billing_mode' });
  }
  return value;
}

function readLimit(url: URL): number | undefined {
  const value = queryValue(url, 'limit');
  return value === null ? undefined : Number(value);
}

function successData<TDto>(results: Array<{ status: string; data?: TDto }>): TDto[] {
  return results.flatMap((result) => (result.status === 'success' && result.data !== undefined ? [result.data] : []));
}

export class ApiServer {
  private readonly services: ApiServices;
  private readonly authenticator: RequestAuthenticator;
  private readonly maxBodyBytes: number;
  private readonly logger: Logger;
  private readonly audit: AuditLog;
  readonly server: http.Server;

  constructor(services: ApiServices, options: ApiServerOptions = {}) {
    this.services = services;
    this.authenticator = options.authenticator ?? createHeaderAuthenticator();
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.logger = options.logger ?? createConsoleLogger('api-server');
    this.audit = options.audit ?? createConsoleAuditLog();
    this.server = http.createServer((req, res) => {
      void this.dispatch(req, res);
    });
  }

  listen(port: number, host: string): Promise<{ host: string; port: number }> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.logger.error('failed to start', error);
        reject(error);
      };
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        const bound = typeof address === 'object' && address ? address.port : port;
        this.logger.info(`listening on http://${host}:${bound}`);
        resolve({ host, port: bound });
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
      this.server.closeAllConnections();
    });
  }

  private async dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = Date.now();
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname.replace(/\/+$/, '') || '/';
    try {
      await this.handleRequest({ req, res, url, path, signal: controller.signal });
    } catch (error) {
      if (!(error instanceof PosSyncError)) {
        this.logger.error('request failed', {
          method: req.method,
          path,
          error: error instanceof Error ? error.stack ?? error.message : String(error),
        });
      }
      if (!res.headersSent) {
        sendJson(res, errorStatus(error), { ok: false, error: toErrorBody(error) });
      } else {
        res.end();
      }
    } finally {
      this.logger.info(`${req.method ?? 'GET'} ${path} ${res.statusCode}`, {
        ms: Date.now() - started,
        user: this.authenticator.authenticate(req),
      });
    }
  }

  private async handleRequest(ctx: RequestContext): Promise<void> {
    const { req, res, path } = ctx;
    const method = req.method ?? 'GET';

    if (method === 'OPTIONS') {
      setCors(res);
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === 'GET' && path === '/health') {
      sendJson(res, 200, { ok: true, status: 'healthy' });
      return;
    }

    if (method === 'POST' && path === '/vendor') {
      await this.registerVendor(ctx);
      return;
    }

    const route = this.matchRoute(method, path);
    if (!route) {
      throw new NotFoundError(`No route for ${method} ${path}.`);
    }

    const caller = this.authorize(req);
    await route(ctx, caller);
  }

  private matchRoute(
    method: string,
    path: string,
  ): ((ctx: RequestContext, caller: Caller) => Promise<void> | void) | null {
    if (path === '/items/sync') {
      if (method === 'POST') return (ctx, caller) => this.pushItems(ctx, caller);
      if (method === 'GET') return (ctx, caller) => this.pullCatalog(ctx, caller, 'item');
    }
    if (path === '/items/categories/sync') {
      if (method === 'POST') return (ctx, caller) => this.pushCategories(ctx, caller);
      if (method === 'GET') return (ctx, caller) => this.pullCatalog(ctx, caller, 'category');
    }
    if (path === '/bills' && method === 'POST') {
      return (ctx, caller) => this.createBill(ctx, caller);
    }
    const billMatch = BILL_PATH.exec(path);
    if (billMatch) {
      const billId = decodeURIComponent(billMatch[1]);
      if (method === 'GET') return (ctx, caller) => this.getBill(ctx, caller, billId);
      if (method === 'PATCH') return (ctx, caller) => this.updateBill(ctx, caller, billId);
    }
    if (path === '/backup/sync') {
      if (method === 'POST') return (ctx, caller) => this.ingestBills(ctx, caller);
      if (method === 'GET') return (ctx, caller) => this.listBills(ctx, caller);
    }
    if (path === '/vendor/profile') {
      if (method === 'GET') return (ctx, caller) => this.getProfile(ctx, caller);
      if (method === 'PATCH') return (ctx, caller) => this.updateProfile(ctx, caller);
    }
    if (path === '/vendor/staff' && method === 'POST') {
      return (ctx, caller) => this.addStaff(ctx, caller);
    }
    const staffMatch = STAFF_PATH.exec(path);
    if (staffMatch && method === 'DELETE') {
      const userId = decodeURIComponent(staffMatch[1]);
      return (ctx, caller) => this.removeStaff(ctx, caller, userId);
    }
    if (path === '/vendor/numbering') {
      if (method === 'GET') return (ctx, caller) => this.getNumbering(ctx, caller);
      if (method === 'PATCH') return (ctx, caller) => this.updateNumbering(ctx, caller);
    }
    return null;
  }

  private authorize(req: IncomingMessage): Caller {
    const userId = this.authenticator.authenticate(req);
    if (!userId) {
      throw new UnauthorizedError();
    }
    const membership = this.services.vendors.resolveMembership(userId);
    if (membership.kind === 'none') {
      throw new ForbiddenError('No vendor profile is linked to this user.');
    }
    if (!membership.vendor.isApproved) {
      throw new ForbiddenError('Vendor account is pending approval.');
    }
    return { userId, vendor: membership.vendor, isOwner: membership.kind === 'owner' };
  }

  private requireOwner(caller: Caller, action: string): void {
    if (!caller.isOwner) {
      throw new ForbiddenError(`Only the vendor owner can ${action}.`);
    }
  }

  /** Open to any signed-in user without a vendor; the new vendor waits for approval. */
  private async registerVendor(ctx: RequestContext): Promise<void> {
    const userId = this.authenticator.authenticate(ctx.req);
    if (!userId) {
      throw new UnauthorizedError();
    }
    if (this.services.vendors.resolveMembership(userId).kind !== 'none') {
      throw new ValidationError('This user already belongs to a vendor.');
    }
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const input = parseOrThrow(vendorRegistrationSchema, body, 'Invalid vendor registration.');
    const vendor = this.services.vendors.createVendor(toNewVendor(userId, input));
    this.audit.record('vendor.registered', { vendorId: vendor.id, userId });
    sendJson(ctx.res, 201, toVendorProfileDto(vendor));
  }

  private getProfile(ctx: RequestContext, caller: Caller): void {
    sendJson(ctx.res, 200, toVendorProfileDto(caller.vendor));
  }

  private async updateProfile(ctx: RequestContext, caller: Caller): Promise<void> {
    this.requireOwner(caller, 'change the vendor profile');
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const patch = parseOrThrow(vendorProfilePatchSchema, body, 'Invalid vendor profile.');
    const vendor = this.services.vendors.updateProfile(caller.vendor.id, toProfilePatch(patch));
    this.audit.record('vendor.profile.updated', {
      vendorId: vendor.id,
      userId: caller.userId,
      fields: Object.keys(patch),
    });
    sendJson(ctx.res, 200, toVendorProfileDto(vendor));
  }

  private async addStaff(ctx: RequestContext, caller: Caller): Promise<void> {
    this.requireOwner(caller, 'manage staff');
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const { user_id: userId } = parseOrThrow(staffMemberSchema, body, 'Invalid staff member.');
    const id = this.services.vendors.addStaffMember(caller.vendor.id, userId, caller.userId);
    this.audit.record('vendor.staff.added', {
      vendorId: caller.vendor.id,
      userId: caller.userId,
      memberUserId: userId,
    });
    const member: StaffMemberDto = { id, user_id: userId, is_active: true };
    sendJson(ctx.res, 201, member);
  }

  private removeStaff(ctx: RequestContext, caller: Caller, userId: string): void {
    this.requireOwner(caller, 'manage staff');
    if (!this.services.vendors.setStaffMemberActive(caller.vendor.id, userId, false)) {
      throw new NotFoundError(`No staff member ${userId} for this vendor.`);
    }
    this.audit.record('vendor.staff.removed', {
      vendorId: caller.vendor.id,
      userId: caller.userId,
      memberUserId: userId,
    });
    sendJson(ctx.res, 200, { user_id: userId, is_active: false });
  }

  private async pushItems(ctx: RequestContext, caller: Caller): Promise<void> {
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const result = await this.services.reconciler.reconcile(caller.vendor.id, 'item', body, {
      signal: ctx.signal,
      userId: caller.userId,
    });
    sendJson(ctx.res, 200, { ...result, items: successData(result.results) });
  }

  private async pushCategories(ctx: RequestContext, caller: Caller): Promise<void> {
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const result = await this.services.reconciler.reconcile(caller.vendor.id, 'category', body, {
      signal: ctx.signal,
      userId: caller.userId,
    });
    sendJson(ctx.res, 200, { ...result, categories: successData(result.results) });
  }

  private pullCatalog(ctx: RequestContext, caller: Caller, kind: 'item' | 'category'): void {
    const since = queryValue(ctx.url, 'since');
    const result =
      kind === 'item'
        ? this.services.reconciler.pullChanges(caller.vendor.id, 'item', since)
        : this.services.reconciler.pullChanges(caller.vendor.id, 'category', since);
    sendJson(ctx.res, 200, result);
  }

  private async createBill(ctx: RequestContext, caller: Caller): Promise<void> {
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const bill = await this.services.ingestor.createBill(caller.vendor.id, body, caller.userId);
    sendJson(ctx.res, 201, bill);
  }

  private getBill(ctx: RequestContext, caller: Caller, billId: string): void {
    sendJson(ctx.res, 200, this.services.ingestor.getBill(caller.vendor.id, billId));
  }

  private async updateBill(ctx: RequestContext, caller: Caller, billId: string): Promise<void> {
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    sendJson(ctx.res, 200, this.services.ingestor.updateBill(caller.vendor.id, billId, body, caller.userId));
  }

  private async ingestBills(ctx: RequestContext, caller: Caller): Promise<void> {
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const { envelopes, single } = toBillEnvelopes(body);
    if (single) {
      const result = this.services.ingestor.ingestOne(caller.vendor.id, envelopes[0]);
      sendJson(ctx.res, 201, { synced: 1, bills: [{ ...result.bill, created: result.created }], errors: [] });
      return;
    }
    sendJson(ctx.res, 201, this.services.ingestor.ingestBatch(caller.vendor.id, envelopes));
  }

  private listBills(ctx: RequestContext, caller: Caller): void {
    const result = this.services.ingestor.listBillsForSync(caller.vendor.id, {
      since: queryValue(ctx.url, 'since'),
      billingMode: readBillingMode(ctx.url),
      startDate: queryValue(ctx.url, 'start_date'),
      endDate: queryValue(ctx.url, 'end_date'),
      limit: readLimit(ctx.url),
    });
    sendJson(ctx.res, 200, result);
  }

  private getNumbering(ctx: RequestContext, caller: Caller): void {
    sendJson(ctx.res, 200, this.services.sequence.getNumberingConfig(caller.vendor.id));
  }

  private async updateNumbering(ctx: RequestContext, caller: Caller): Promise<void> {
    this.requireOwner(caller, 'change bill numbering');
    const body = await readJsonBody(ctx.req, this.maxBodyBytes);
    const patch = parseOrThrow(numberingPatchSchema, body, 'Invalid numbering settings.');
    const config = await this.services.sequence.setNumberingConfig(caller.vendor.id, {
      prefix: patch.prefix,
      startingNumber: patch.starting_number,
    });
    this.audit.record('vendor.numbering.updated', {
      vendorId: caller.vendor.id,
      userId: caller.userId,
      prefix: config.prefix,
      startingNumber: config.starting_number,
    });
    sendJson(ctx.res, 200, config);
  }
}

export function createApiServer(services: ApiServices, options: ApiServerOptions = {}): ApiServer {
  return new ApiServer(services, options);
}
