/**
 * MSW Request Handlers
 *
 * Stateful stand-in for the Kaleidoscope API, seeded from ../fixtures.
 * Every resource endpoint requires a bearer token issued by the token
 * endpoint below.
 */

import { http, HttpResponse } from 'msw';
import activitiesFixture from '../fixtures/activities.json';
import definitionsFixture from '../fixtures/activity_definitions.json';
import dataFieldsFixture from '../fixtures/data_fields.json';
import entityTypesFixture from '../fixtures/entity_types.json';
import groupsFixture from '../fixtures/groups.json';
import keyFieldsFixture from '../fixtures/key_fields.json';
import labelsFixture from '../fixtures/labels.json';
import membersFixture from '../fixtures/members.json';
import programsFixture from '../fixtures/programs.json';
import recordViewsFixture from '../fixtures/record_views.json';
import recordsFixture from '../fixtures/records.json';

export const API_BASE = 'https://kaleidoscope.test';
export const TEST_CLIENT_ID = 'test-client';
export const TEST_CLIENT_SECRET = 'test-secret';

type Json = Record<string, unknown>;

interface StoredValue extends Json {
  content: unknown;
  created_at: string | null;
  record_id: string | null;
  operation_id: string | null;
}

interface StoredRecord extends Json {
  id: string;
  entity_slice_id: string;
  record_identifier: string;
  record_values: Record<string, StoredValue[]>;
}

interface StoredProperty extends Json {
  id: string;
  content: unknown;
}

interface StoredActivity extends Json {
  id: string;
  parent_id?: string | null;
  all_record_ids: string[];
  properties: StoredProperty[];
}

interface StoredField extends Json {
  id: string;
  field_name: string;
}

interface StoredView extends Json {
  id: string;
}

export interface LoggedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  authorization: string | null;
}

interface Stores {
  accessTokens: Set<string>;
  refreshTokens: Set<string>;
  tokenRequests: Array<Record<string, string>>;
  /** expires_in sent with new tokens; 600 or less makes them due immediately */
  tokenLifetime: number;
  issueRefreshTokens: boolean;
  rejectRefresh: boolean;
  issued: number;
  created: number;
  requests: LoggedRequest[];
  activities: StoredActivity[];
  definitions: Json[];
  records: StoredRecord[];
  keyFields: StoredField[];
  dataFields: StoredField[];
  entityTypes: Json[];
  recordViews: StoredView[];
  programs: Json[];
  labels: Json[];
  members: Json[];
  groups: Json[];
}

function toHistories(values: Partial<Record<string, StoredValue[]>>): Record<string, StoredValue[]> {
  const histories: Record<string, StoredValue[]> = {};
  for (const [fieldId, history] of Object.entries(values)) {
    if (history) histories[fieldId] = history;
  }
  return histories;
}

function seedRecords(): StoredRecord[] {
  return structuredClone(recordsFixture).map((record) => ({
    ...record,
    record_values: toHistories(record.record_values),
  }));
}

function seed(): Stores {
  return {
    accessTokens: new Set(),
    refreshTokens: new Set(),
    tokenRequests: [],
    tokenLifetime: 3600,
    issueRefreshTokens: true,
    rejectRefresh: false,
    issued: 0,
    created: 0,
    requests: [],
    activities: structuredClone(activitiesFixture),
    definitions: structuredClone(definitionsFixture),
    records: seedRecords(),
    keyFields: structuredClone(keyFieldsFixture),
    dataFields: structuredClone(dataFieldsFixture),
    entityTypes: structuredClone(entityTypesFixture),
    recordViews: structuredClone(recordViewsFixture),
    programs: structuredClone(programsFixture),
    labels: structuredClone(labelsFixture),
    members: structuredClone(membersFixture),
    groups: structuredClone(groupsFixture),
  };
}

// In-memory stores for stateful mocks
export const stores: Stores = seed();

/**
 * Restore every store to its seeded state
 */
export function resetStores(): void {
  Object.assign(stores, seed());
}

// Helpers
function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJson(request: Request): Promise<Json> {
  const body: unknown = await request.json();
  return isJson(body) ? body : {};
}

function nextId(prefix: string): string {
  stores.created += 1;
  return `${prefix}-new-${stores.created}`;
}

function unauthorized() {
  return HttpResponse.json({ detail: 'Not authenticated' }, { status: 401 });
}

function notFound(resource: string) {
  return HttpResponse.json({ detail: `${resource} not found` }, { status: 404 });
}

/**
 * Log the request and check its bearer token. Returns the rejection to send,
 * or null when the request may proceed.
 */
function admit(request: Request): Response | null {
  const url = new URL(request.url);
  const authorization = request.headers.get('Authorization');
  stores.requests.push({
    method: request.method,
    path: url.pathname,
    query: Object.fromEntries(url.searchParams),
    authorization,
  });

  const token = authorization?.startsWith('Bearer ') ? authorization.slice(7) : '';
  return stores.accessTokens.has(token) ? null : unauthorized();
}

function issueToken() {
  stores.issued += 1;
  const accessToken = `access-${stores.issued}`;
  const refreshToken = `refresh-${stores.issued}`;
  stores.accessTokens.add(accessToken);

  const body: Json = {
    access_token: accessToken,
    token_type: 'Bearer',
    expires_in: stores.tokenLifetime,
  };
  if (stores.issueRefreshTokens) {
    stores.refreshTokens.add(refreshToken);
    body.refresh_token = refreshToken;
  }
  return HttpResponse.json(body);
}

function findByKeyValues(keyValues: Json): StoredRecord | undefined {
  const wanted = Object.entries(keyValues).map(([name, value]) => {
    const field = stores.keyFields.find((f) => f.field_name === name || f.id === name);
    return { fieldId: field?.id ?? name, value };
  });
  return stores.records.find((record) =>
    wanted.every(({ fieldId, value }) =>
      (record.record_values[fieldId] ?? []).some((v) => v.content === value)
    )
  );
}

function appendValue(record: StoredRecord, fieldId: string, content: unknown, operationId: unknown) {
  const value: StoredValue = {
    id: nextId('val'),
    field_id: fieldId,
    content,
    created_at: new Date().toISOString(),
    record_id: record.id,
    operation_id: typeof operationId === 'string' ? operationId : null,
  };
  const history = record.record_values[fieldId] ?? [];
  history.push(value);
  record.record_values[fieldId] = history;
  return value;
}

function getOrCreateField(list: StoredField[], prefix: string, fields: Json): StoredField {
  const existing = list.find((f) => f.field_name === fields.field_name);
  if (existing) return existing;
  const created: StoredField = {
    id: nextId(prefix),
    created_at: new Date().toISOString(),
    is_key: prefix === 'kf',
    field_name: String(fields.field_name),
    field_type: typeof fields.field_type === 'string' ? fields.field_type : 'text',
    ref_slice_id: null,
  };
  list.push(created);
  return created;
}

// =============================================================================
// Auth Endpoints
// =============================================================================
const authHandlers = [
  http.post(`${API_BASE}/auth/oauth/token`, async ({ request }) => {
    const form = Object.fromEntries(new URLSearchParams(await request.text()));
    stores.tokenRequests.push(form);

    if (form.grant_type === 'client_credentials') {
      if (form.client_id !== TEST_CLIENT_ID || form.client_secret !== TEST_CLIENT_SECRET) {
        return HttpResponse.json({ detail: 'invalid_client' }, { status: 401 });
      }
      return issueToken();
    }

    if (form.grant_type === 'refresh_token') {
      const refreshToken = form.refresh_token ?? '';
      if (stores.rejectRefresh || !stores.refreshTokens.has(refreshToken)) {
        return HttpResponse.json({ detail: 'invalid_grant' }, { status: 401 });
      }
      stores.refreshTokens.delete(refreshToken);
      return issueToken();
    }

    return HttpResponse.json({ detail: 'unsupported_grant_type' }, { status: 400 });
  }),
];

// =============================================================================
// Activity Endpoints
// =============================================================================
const activityHandlers = [
  http.get(`${API_BASE}/activities`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;

    const ids = new URL(request.url).searchParams.get('activity_ids');
    if (ids === null) return HttpResponse.json(stores.activities);
    const wanted = ids.split(',');
    return HttpResponse.json(stores.activities.filter((a) => wanted.includes(a.id)));
  }),

  http.post(`${API_BASE}/activities`, async ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;

    const body = await readJson(request);
    const activity: StoredActivity = {
      id: nextId('act'),
      created_at: new Date().toISOString(),
      parent_id: null,
      child_ids: [],
      definition_id: body.definition_id ?? null,
      program_ids: body.program_ids ?? [],
      activity_type: body.activity_type,
      title: body.title,
      description: null,
      status: 'new',
      assigned_user_ids: body.assigned_user_ids ?? [],
      assigned_group_ids: [],
      start_date: body.start_date ?? null,
      duration: body.duration ?? null,
      dependencies: [],
      label_ids: [],
      is_draft: false,
      properties: [],
      all_record_ids: [],
    };
    stores.activities.push(activity);
    return HttpResponse.json([activity], { status: 201 });
  }),

  http.get(`${API_BASE}/activities/:id/activities`, ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.activities.filter((a) => a.parent_id === params.id));
  }),

  http.get(`${API_BASE}/activities/:id`, ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const activity = stores.activities.find((a) => a.id === params.id);
    return activity ? HttpResponse.json(activity) : notFound('Activity');
  }),

  http.put(`${API_BASE}/activities/:id`, async ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const activity = stores.activities.find((a) => a.id === params.id);
    if (!activity) return notFound('Activity');
    Object.assign(activity, await readJson(request));
    return HttpResponse.json(activity);
  }),

  http.get(`${API_BASE}/activity_definitions`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.definitions);
  }),

  http.get(`${API_BASE}/operations/:id/records`, ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const activity = stores.activities.find((a) => a.id === params.id);
    if (!activity) return notFound('Operation');
    return HttpResponse.json(stores.records.filter((r) => activity.all_record_ids.includes(r.id)));
  }),

  http.put(`${API_BASE}/operations/:id/records`, async ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const activity = stores.activities.find((a) => a.id === params.id);
    if (!activity) return notFound('Operation');
    const body = await readJson(request);
    const added = Array.isArray(body.record_ids) ? body.record_ids.map(String) : [];
    activity.all_record_ids = [...new Set([...activity.all_record_ids, ...added])];
    return HttpResponse.json({ record_ids: activity.all_record_ids });
  }),

  http.put(`${API_BASE}/properties/:id`, async ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const property = stores.activities.flatMap((a) => a.properties).find((p) => p.id === params.id);
    if (!property) return notFound('Property');
    const body = await readJson(request);
    property.content = body.content;
    property.last_updated_by = 'user-1';
    return HttpResponse.json(property);
  }),

  http.post(`${API_BASE}/properties/:id/file`, async ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const form = await request.formData();
    const file = form.get('file');
    if (!(file instanceof File)) {
      return HttpResponse.json({ detail: 'file is required' }, { status: 422 });
    }
    return HttpResponse.json({
      property_id: params.id,
      file_name: file.name,
      file_type: file.type,
      size: file.size,
    });
  }),
];

// =============================================================================
// Record Endpoints
// =============================================================================
const recordHandlers = [
  http.get(`${API_BASE}/records`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    const ids = (new URL(request.url).searchParams.get('record_ids') ?? '').split(',');
    return HttpResponse.json(stores.records.filter((r) => ids.includes(r.id)));
  }),

  http.post(`${API_BASE}/records`, async ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;

    const body = await readJson(request);
    const keyValues = isJson(body.key_field_to_value) ? body.key_field_to_value : {};
    const existing = findByKeyValues(keyValues);
    if (existing) return HttpResponse.json(existing);

    const now = new Date().toISOString();
    const record: StoredRecord = {
      id: nextId('rec'),
      created_at: now,
      entity_slice_id: 'slice-compound',
      identifier_ids: [],
      record_identifier: Object.values(keyValues).map(String).join(':'),
      record_values: {},
      initial_operation_id: null,
      sub_record_ids: [],
    };
    for (const [name, value] of Object.entries(keyValues)) {
      const field = stores.keyFields.find((f) => f.field_name === name || f.id === name);
      record.record_values[field?.id ?? name] = [
        { content: value, created_at: now, record_id: null, operation_id: null },
      ];
    }
    stores.records.push(record);
    return HttpResponse.json(record, { status: 201 });
  }),

  http.get(`${API_BASE}/records/identifiers`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;

    const raw = new URL(request.url).searchParams.get('records_key_field_to_value') ?? '[]';
    const parsed: unknown = JSON.parse(raw);
    const lookups = Array.isArray(parsed) ? parsed.filter(isJson) : [];
    return HttpResponse.json(lookups.map((keyValues) => ({ record: findByKeyValues(keyValues) ?? null })));
  }),

  http.get(`${API_BASE}/records/search`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;

    const search = new URL(request.url).searchParams;
    const sliceId = search.get('entity_slice_id');
    const text = search.get('search_text');
    const matches = stores.records.filter(
      (r) =>
        (sliceId === null || r.entity_slice_id === sliceId) &&
        (text === null || r.record_identifier.includes(text))
    );
    return HttpResponse.json(matches.map((r) => r.id));
  }),

  http.get(`${API_BASE}/records/export/csv`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return new HttpResponse('Compound ID,Solubility\nCMP-1,15\nCMP-2,40\n', {
      headers: { 'Content-Type': 'text/csv' },
    });
  }),

  http.get(`${API_BASE}/records/:id`, ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const record = stores.records.find((r) => r.id === params.id);
    return record ? HttpResponse.json(record) : notFound('Record');
  }),

  http.get(`${API_BASE}/records/:id/operations`, ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const id = String(params.id);
    return HttpResponse.json(stores.activities.filter((a) => a.all_record_ids.includes(id)));
  }),

  http.get(`${API_BASE}/records/:id/values`, ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const record = stores.records.find((r) => r.id === params.id);
    if (!record) return notFound('Record');
    const values = Object.entries(record.record_values).flatMap(([fieldId, history]) =>
      history.map((value) => ({ field_id: fieldId, ...value }))
    );
    return HttpResponse.json(values);
  }),

  http.post(`${API_BASE}/records/:id/values`, async ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const record = stores.records.find((r) => r.id === params.id);
    if (!record) return notFound('Record');
    const body = await readJson(request);
    const resource = appendValue(record, String(body.field_id), body.content, body.operation_id);
    return HttpResponse.json({ resource }, { status: 201 });
  }),

  http.post(`${API_BASE}/records/:id/values/file`, async ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const record = stores.records.find((r) => r.id === params.id);
    if (!record) return notFound('Record');

    const form = await request.formData();
    const file = form.get('file');
    const rawBody = form.get('body');
    if (!(file instanceof File) || typeof rawBody !== 'string') {
      return HttpResponse.json({ detail: 'file and body are required' }, { status: 422 });
    }
    const parsed: unknown = JSON.parse(rawBody);
    const body = isJson(parsed) ? parsed : {};
    const content = { file_name: file.name, file_type: file.type, text: await file.text() };
    const resource = appendValue(record, String(body.field_id), content, body.operation_id);
    return HttpResponse.json({ resource }, { status: 201 });
  }),
];

// =============================================================================
// Field, Entity Type and View Endpoints
// =============================================================================
const catalogHandlers = [
  http.get(`${API_BASE}/key_fields`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.keyFields);
  }),

  http.post(`${API_BASE}/key_fields/`, async ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(getOrCreateField(stores.keyFields, 'kf', await readJson(request)));
  }),

  http.get(`${API_BASE}/data_fields`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.dataFields);
  }),

  http.post(`${API_BASE}/data_fields/`, async ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(getOrCreateField(stores.dataFields, 'df', await readJson(request)));
  }),

  http.get(`${API_BASE}/entity_slices`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.entityTypes);
  }),

  http.get(`${API_BASE}/record_views`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.recordViews);
  }),

  http.put(`${API_BASE}/record_views/:id/add_key_field`, async ({ request, params }) => {
    const denied = admit(request);
    if (denied) return denied;
    const view = stores.recordViews.find((v) => v.id === params.id);
    if (!view) return notFound('Record view');
    const body = await readJson(request);
    view.key_field_names = [String(body.new_key_field_name)];
    return HttpResponse.json(view);
  }),

  http.get(`${API_BASE}/programs`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.programs);
  }),

  http.get(`${API_BASE}/labels`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.labels);
  }),

  http.get(`${API_BASE}/workspace/members`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.members);
  }),

  http.get(`${API_BASE}/workspace/groups`, ({ request }) => {
    const denied = admit(request);
    if (denied) return denied;
    return HttpResponse.json(stores.groups);
  }),
];

// =============================================================================
// Import Endpoints
// =============================================================================
async function acceptImport(request: Request, sourceId: string | null) {
  const denied = admit(request);
  if (denied) return denied;
  const body = await readJson(request);
  const rows = Array.isArray(body.data) ? body.data : [];
  return HttpResponse.json({ status: 'success', records_created: rows.length, source_id: sourceId });
}

const importHandlers = [
  http.post(`${API_BASE}/push/imports`, ({ request }) => acceptImport(request, null)),
  http.post(`${API_BASE}/push/imports/:sourceId`, ({ request, params }) =>
    acceptImport(request, String(params.sourceId))
  ),
];

export const handlers = [
  ...authHandlers,
  ...activityHandlers,
  ...recordHandlers,
  ...catalogHandlers,
  ...importHandlers,
];
