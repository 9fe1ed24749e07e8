/**
 * Tests for request shapes and error mapping of DataApiClient.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DataApiClient } from '../client/index.js';
import { DataApiConfig } from '../config.js';
import {
  AuthError,
  NetworkError,
  NotAuthenticatedError,
  ParseError,
  RecordConflictError,
  ServiceError,
  TimeoutError,
  TokenExpiredError,
} from '../errors.js';
import { MockHttpTransport, envelope, type MockCall } from '../mocks/index.js';
import { SessionState } from '../session/index.js';
import { BASE_URL } from './fixtures.js';

const ROOT = `${BASE_URL}/fmi/data/vLatest/databases/Contacts`;

function config(): DataApiConfig {
  return DataApiConfig.builder()
    .baseUrl(BASE_URL)
    .database('Contacts')
    .layout('Contacts')
    .credentials('admin', 'test-secret')
    .coerceFields(false)
    .build();
}

function page(data: unknown[] = [], foundCount = data.length) {
  return {
    body: envelope({
      data,
      dataInfo: {
        database: 'Contacts',
        layout: 'Contacts',
        table: 'Contacts',
        totalRecordCount: foundCount,
        foundCount,
        returnedCount: data.length,
      },
    }),
  };
}

const JOHN = { fieldData: { name: 'John Smith' }, portalData: {}, recordId: '1', modId: '0' };

describe('DataApiClient', () => {
  let transport: MockHttpTransport;
  let client: DataApiClient;

  function lastCall(): MockCall {
    const calls = transport.getCalls();
    return calls[calls.length - 1];
  }

  function params(call: MockCall): Record<string, string> {
    return Object.fromEntries(new URL(call.url).searchParams);
  }

  beforeEach(async () => {
    transport = new MockHttpTransport();
    transport.mock({ url: '/sessions', method: 'POST' }, { body: envelope({ token: 'tok-1' }) });
    client = new DataApiClient(config(), { transport });
    await client.login();
  });

  describe('login', () => {
    it('should send data source credentials', async () => {
      const withSources = new DataApiClient(
        DataApiConfig.builder()
          .baseUrl(BASE_URL)
          .database('Contacts')
          .layout('Contacts')
          .credentials('admin', 'test-secret')
          .dataSource('Archive', 'reader', 'test-secret')
          .build(),
        { transport }
      );

      await withSources.login();

      expect(lastCall().url).toBe(`${ROOT}/sessions`);
      expect(lastCall().body).toEqual({
        fmDataSource: [{ database: 'Archive', username: 'reader', password: 'test-secret' }],
      });
    });

    it('should read the token from the response header when the body has none', async () => {
      transport.reset().mock(
        { url: '/sessions', method: 'POST' },
        { body: envelope({}), headers: { 'x-fm-data-access-token': 'hdr-token' } }
      );

      expect(await client.login()).toBe('hdr-token');
    });

    it('should fail when no token is returned', async () => {
      transport.reset().mock({ url: '/sessions', method: 'POST' }, { body: envelope({}) });
      const fresh = new DataApiClient(config(), { transport });

      await expect(fresh.login()).rejects.toThrow('Login response did not include an access token');
      expect(fresh.sessionState).toBe(SessionState.NoToken);
    });

    it('should wrap transport failures in AuthError', async () => {
      const fresh = new DataApiClient(config(), {
        transport: {
          send: async () => {
            throw new NetworkError('connect ECONNREFUSED');
          },
        },
      });

      const attempt = fresh.login();
      await expect(attempt).rejects.toThrow(AuthError);
      await expect(attempt).rejects.toThrow('Login failed: Network error: connect ECONNREFUSED');
    });
  });

  describe('getRecords', () => {
    it('should page from the first record by default', async () => {
      transport.mock(/\/records\?/, page([JOHN]));

      const foundset = await client.getRecords();

      expect(foundset.totalCount).toBe(1);
      expect(lastCall().method).toBe('GET');
      expect(lastCall().url).toBe(`${ROOT}/layouts/Contacts/records?_offset=1&_limit=100`);
      expect(lastCall().headers).toEqual({
        'User-Agent': 'fm-data-client/0.1.0',
        Accept: 'application/json',
        Authorization: 'Bearer tok-1',
      });
    });

    it('should encode sort, portals and scripts as query parameters', async () => {
      transport.mock(/\/records\?/, page());

      await client.getRecords({
        layout: 'Web Contacts',
        offset: 11,
        limit: 5,
        sort: [{ fieldName: 'name', sortOrder: 'descend' }],
        portals: [{ name: 'Phones', offset: 2, limit: 10 }],
        scripts: { prerequest: ['Prepare', 'x'], after: ['Done'] },
      });

      expect(new URL(lastCall().url).pathname).toBe(
        '/fmi/data/vLatest/databases/Contacts/layouts/Web%20Contacts/records'
      );
      expect(params(lastCall())).toEqual({
        _offset: '11',
        _limit: '5',
        _sort: '[{"fieldName":"name","sortOrder":"descend"}]',
        portal: '["Phones"]',
        '_offset.Phones': '2',
        '_limit.Phones': '10',
        'script.prerequest': 'Prepare',
        'script.prerequest.param': 'x',
        script: 'Done',
      });
    });

    it('should return an empty foundset without a request for limit 0', async () => {
      const before = transport.getCalls().length;

      const foundset = await client.getRecords({ limit: 0 });

      expect(foundset.size).toBe(0);
      expect(transport.getCalls()).toHaveLength(before);
    });
  });

  describe('getRecord', () => {
    it('should request one record with a response layout', async () => {
      transport.mock(/\/records\/1/, page([JOHN]));

      const record = await client.getRecord(1, { responseLayout: 'Contact Summary' });

      expect(record.get('name')).toBe('John Smith');
      expect(new URL(lastCall().url).pathname).toBe(
        '/fmi/data/vLatest/databases/Contacts/layouts/Contacts/records/1'
      );
      expect(params(lastCall())).toEqual({ 'layout.response': 'Contact Summary' });
    });

    it('should map a missing record to ServiceError', async () => {
      transport.mock(/\/records\/99/, {
        status: 500,
        body: envelope({}, 101, 'Record is missing'),
      });

      const attempt = client.getRecord(99);
      await expect(attempt).rejects.toThrow(ServiceError);
      await expect(attempt).rejects.toThrow('Service returned error 101: Record is missing');
      expect(client.lastError).toBe(101);
    });
  });

  describe('find', () => {
    it('should send requests, omit flags and options in the body', async () => {
      transport.mock('/_find', page([JOHN]));

      const foundset = await client.find(
        [{ name: 'John' }, { name: 'Jo', omit: true }, { city: 'Boston', _omit: 'false' }],
        {
          sort: [{ fieldName: 'name', sortOrder: 'ascend' }],
          portals: [{ name: 'Phones', limit: 10 }],
          limit: 20,
        }
      );

      expect(foundset.size).toBe(1);
      expect(lastCall().method).toBe('POST');
      expect(lastCall().url).toBe(`${ROOT}/layouts/Contacts/_find`);
      expect(lastCall().headers['Content-Type']).toBe('application/json');
      expect(lastCall().body).toEqual({
        query: [{ name: 'John' }, { name: 'Jo', omit: 'true' }, { city: 'Boston' }],
        sort: [{ fieldName: 'name', sortOrder: 'ascend' }],
        offset: '1',
        limit: '20',
        portal: ['Phones'],
        'limit.Phones': '10',
      });
    });

    it('should turn "no records match" into an empty foundset', async () => {
      transport.mock('/_find', {
        status: 500,
        body: envelope({}, 401, 'No records match the request'),
      });

      const foundset = await client.find([{ name: 'Nobody' }]);

      expect(foundset.size).toBe(0);
      expect(await foundset.toArray()).toEqual([]);
      expect(client.lastError).toBe(401);
    });

    it('should fail on empty criteria', async () => {
      transport.mock('/_find', {
        status: 500,
        body: envelope({}, 400, 'Find criteria are empty'),
      });

      await expect(client.find([{}])).rejects.toMatchObject({
        serviceCode: 400,
        code: 'FM_SERVICE',
      });
    });
  });

  describe('writes', () => {
    it('should create records with portal rows and scripts', async () => {
      transport.mock({ url: /\/records$/, method: 'POST' }, {
        body: envelope({ recordId: '12', modId: '0' }),
      });

      const created = await client.createRecord(
        { name: 'Zed Park', age: 30, joined: new Date(Date.UTC(1990, 0, 5)), city: null },
        {
          portalData: { Phones: [{ 'Phones::number': '555-0142' }] },
          scripts: { after: ['Welcome', '12'] },
        }
      );

      expect(created).toEqual({ recordId: 12, modId: 0 });
      expect(lastCall().body).toEqual({
        fieldData: { name: 'Zed Park', age: 30, joined: '01/05/1990 00:00:00', city: null },
        portalData: { Phones: [{ 'Phones::number': '555-0142' }] },
        script: 'Welcome',
        'script.param': '12',
      });
    });

    it('should send the modification id as a string when editing', async () => {
      transport.mock({ url: /\/records\/7$/, method: 'PATCH' }, { body: envelope({ modId: '4' }) });

      const modId = await client.editRecord(7, { city: 'Salem' }, { modId: 3 });

      expect(modId).toBe(4);
      expect(lastCall().body).toEqual({ fieldData: { city: 'Salem' }, modId: '3' });
    });

    it('should map a modification id mismatch to RecordConflictError', async () => {
      transport.mock({ url: /\/records\/7$/, method: 'PATCH' }, {
        status: 500,
        body: envelope({}, 306, 'Record modification ID does not match'),
      });

      await expect(client.editRecord(7, { city: 'Salem' }, { modId: 3 })).rejects.toThrow(
        RecordConflictError
      );
      expect(client.lastError).toBe(306);
    });

    it('should put delete scripts in the query', async () => {
      await client.deleteRecord(7, { scripts: { after: ['Cleanup', '7'] } });

      expect(lastCall().method).toBe('DELETE');
      expect(lastCall().body).toBeUndefined();
      expect(params(lastCall())).toEqual({ script: 'Cleanup', 'script.param': '7' });
    });

    it('should upload container data as multipart form', async () => {
      transport.mock('/containers/', { body: envelope({ modId: '2' }) });

      const modId = await client.uploadContainer(7, 'photo', new Uint8Array([1, 2, 3]), {
        filename: 'avatar.png',
        contentType: 'image/png',
      });

      const call = lastCall();
      const upload = call.form?.get('upload');
      expect(modId).toBe(2);
      expect(call.url).toBe(`${ROOT}/layouts/Contacts/records/7/containers/photo/1`);
      expect(call.headers['Content-Type']).toBeUndefined();
      expect(typeof upload === 'object' && upload !== null ? upload.name : undefined).toBe('avatar.png');
    });
  });

  describe('scripts and globals', () => {
    it('should call a script with its parameter', async () => {
      transport.mock('/script/', {
        body: envelope({ scriptResult: 'Hello Ann', scriptError: '0' }),
      });

      const result = await client.callScript('Greet', 'Ann');

      expect(result).toEqual({ scriptError: 0, scriptResult: 'Hello Ann' });
      expect(lastCall().url).toBe(`${ROOT}/layouts/Contacts/script/Greet`);
      expect(lastCall().body).toEqual({ 'script.param': 'Ann' });
      expect(client.lastScriptResult).toEqual({ after: { error: 0, result: 'Hello Ann' } });
    });

    it('should set globals with a PATCH', async () => {
      await client.setGlobals({ 'Contacts::g_user': 'ann' });

      expect(lastCall().method).toBe('PATCH');
      expect(lastCall().url).toBe(`${ROOT}/globals`);
      expect(lastCall().body).toEqual({ globalFields: { 'Contacts::g_user': 'ann' } });
    });
  });

  describe('failures', () => {
    it('should drop the session when the token is rejected', async () => {
      transport.mock(/\/records/, {
        status: 401,
        body: envelope({}, 952, 'Invalid FileMaker Data API token (*)'),
      });

      await expect(client.getRecords()).rejects.toThrow(TokenExpiredError);
      expect(client.sessionState).toBe(SessionState.NoToken);

      const sent = transport.getCalls().length;
      await expect(client.getRecords()).rejects.toThrow(NotAuthenticatedError);
      expect(transport.getCalls()).toHaveLength(sent);
    });

    it('should raise ParseError for bodies that are not JSON', async () => {
      transport.mock(/\/records/, { status: 502, body: '<html>Bad gateway</html>' });

      await expect(client.getRecords()).rejects.toThrow(ParseError);
      expect(client.lastError).toBe(-1);
      expect(client.sessionState).toBe(SessionState.Valid);
    });

    it('should raise ParseError for records without the expected shape', async () => {
      transport.mock(/\/records/, { body: envelope({ rows: [] }) });

      await expect(client.getRecords()).rejects.toThrow(
        'Unexpected record response: data: Required'
      );
    });

    it('should time out without changing the session', async () => {
      transport.mock(/\/records/, { body: page([JOHN]).body, delay: 200 });

      await expect(client.getRecord(1, { timeout: 20 })).rejects.toThrow(
        new TimeoutError(20).message
      );
      expect(client.sessionState).toBe(SessionState.Valid);
    });

    it('should bound metadata lookups and the request by one timeout', async () => {
      const coercing = new DataApiClient(
        DataApiConfig.builder()
          .baseUrl(BASE_URL)
          .database('Contacts')
          .layout('Contacts')
          .credentials('admin', 'test-secret')
          .build(),
        { transport }
      );
      await coercing.login();
      transport
        .mock(/\/records/, { body: page([JOHN]).body, delay: 70 })
        .mock(/\/layouts\/Contacts$/, {
          body: envelope({ fieldMetaData: [], portalMetaData: {} }),
          delay: 70,
        })
        .mock(/\/productInfo/, {
          body: envelope({ productInfo: { name: 'Data API', version: '21.0' } }),
          delay: 70,
        });

      await expect(coercing.getRecord(1, { timeout: 100 })).rejects.toThrow(
        new TimeoutError(100).message
      );
      expect(transport.getCallsTo('/records')).toHaveLength(0);
      expect(coercing.sessionState).toBe(SessionState.Valid);
    });
  });

  it('should use the configured API version', async () => {
    const v1 = new DataApiClient(
      DataApiConfig.builder()
        .baseUrl(BASE_URL)
        .database('Contacts')
        .layout('Contacts')
        .credentials('admin', 'test-secret')
        .apiVersion('v1')
        .build(),
      { transport }
    );

    await v1.login();

    expect(lastCall().url).toBe(`${BASE_URL}/fmi/data/v1/databases/Contacts/sessions`);
  });

  it('should refuse calls after logout', async () => {
    await client.logout();

    expect(lastCall().method).toBe('DELETE');
    expect(lastCall().url).toBe(`${ROOT}/sessions/tok-1`);
    await expect(client.callScript('Greet')).rejects.toThrow(NotAuthenticatedError);
  });
});
