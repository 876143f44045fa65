import { describe, expect, it } from 'vitest';
import { Readable } from 'node:stream';
import {
  collectStatusFromBuffer,
  collectStatusFromStream,
  createStatusSpecs,
  HeaderArityMismatchError,
  InvalidNumericValueError,
  InvalidTimestampError,
  MeasurementBuffer,
  MissingHeaderError,
  UnrecognizedFormatError,
  UnsupportedRecordTypeError
} from '../src/status/index.js';
import { collectText, readFixture, toSamples } from './helpers/status.js';

const UPDATE_TIME = 'openvpn_status_update_time_seconds';
const RECEIVED = 'openvpn_server_client_received_bytes_total';
const SENT = 'openvpn_server_client_sent_bytes_total';
const ROUTE = 'openvpn_server_route_last_reference_time_seconds';
const CONNECTED = 'openvpn_server_connected_clients';

function expectedServerSamples(source: string) {
  const alice = [source, 'alice', 'Mon Oct 21 08:00:01 2024', '198.51.100.10:51234', '10.8.0.2', 'alice'];
  const bob = [source, 'bob', 'Mon Oct 21 08:30:00 2024', '203.0.113.7:40000', '10.8.0.3', 'bob'];
  return [
    { name: UPDATE_TIME, value: 1729502588, labels: [source] },
    { name: RECEIVED, value: 3860, labels: alice },
    { name: SENT, value: 3447, labels: alice },
    { name: RECEIVED, value: 12000, labels: bob },
    { name: SENT, value: 8000, labels: bob },
    { name: ROUTE, value: 1729502580, labels: [source, 'alice', '198.51.100.10:51234', '10.8.0.2'] },
    { name: ROUTE, value: 1729502520, labels: [source, 'bob', '203.0.113.7:40000', '10.8.0.3'] },
    { name: CONNECTED, value: 2, labels: [source] }
  ];
}

function collectFailure(text: string) {
  const emitter = new MeasurementBuffer();
  let failure: unknown = null;
  try {
    collectStatusFromBuffer('broken.status', Buffer.from(text), {
      specs: createStatusSpecs(),
      emitter,
      logger: { debug: () => {} }
    });
  } catch (error) {
    failure = error;
  }
  return { failure, emitted: emitter.size };
}

describe('server status, comma separated', () => {
  it('emits client, route and summary metrics', () => {
    const result = collectText('server.status', readFixture('server-v2.status'));
    expect(result.dialect).toBe('server-v2');
    expect(result.samples).toEqual(expectedServerSamples('server.status'));
  });

  it('reads CRLF line endings', () => {
    const text = readFixture('server-v2.status').replace(/\n/g, '\r\n');
    expect(collectText('server.status', text).samples).toEqual(expectedServerSamples('server.status'));
  });

  it('labels by common name only when individuals are ignored', () => {
    const { samples } = collectText('server.status', readFixture('server-v2.status'), {
      ignoreIndividuals: true
    });
    expect(samples.filter(sample => sample.name === RECEIVED)).toEqual([
      { name: RECEIVED, value: 3860, labels: ['server.status', 'alice'] },
      { name: RECEIVED, value: 12000, labels: ['server.status', 'bob'] }
    ]);
    expect(samples.filter(sample => sample.name === ROUTE)).toEqual([
      { name: ROUTE, value: 1729502580, labels: ['server.status', 'alice'] },
      { name: ROUTE, value: 1729502520, labels: ['server.status', 'bob'] }
    ]);
  });

  it('skips repeated label sets but still counts the client', () => {
    const text = [
      'TITLE,test server',
      'HEADER,CLIENT_LIST,Common Name,Bytes Received,Bytes Sent',
      'CLIENT_LIST,alice,1,2',
      'CLIENT_LIST,alice,5,6',
      'END'
    ].join('\n');
    const labels = ['s', 'alice', '', '', '', 'alice'];

    const result = collectText('s', text);
    expect(result.samples).toEqual([
      { name: RECEIVED, value: 1, labels },
      { name: SENT, value: 2, labels },
      { name: CONNECTED, value: 2, labels: ['s'] }
    ]);
    expect(result.debug).toEqual([
      'Metric entry with same labels already emitted',
      'Metric entry with same labels already emitted'
    ]);
  });

  it('reports zero connected clients for an empty client list', () => {
    const text = [
      'TITLE,test server',
      'TIME,Mon Oct 21 09:23:08 2024,1700000000',
      'HEADER,CLIENT_LIST,Common Name,Bytes Received',
      'END'
    ].join('\n');
    expect(collectText('s', text).samples).toEqual([
      { name: UPDATE_TIME, value: 1700000000, labels: ['s'] },
      { name: CONNECTED, value: 0, labels: ['s'] }
    ]);
  });

  it('skips metric columns the header does not describe', () => {
    const text = ['TITLE,test server', 'HEADER,CLIENT_LIST,Common Name,Bytes Received', 'CLIENT_LIST,alice,5'].join(
      '\n'
    );
    expect(collectText('s', text).samples).toEqual([
      { name: RECEIVED, value: 5, labels: ['s', 'alice', '', '', '', 'alice'] },
      { name: CONNECTED, value: 1, labels: ['s'] }
    ]);
  });

  it('emits nothing when a value is not numeric', () => {
    const { failure, emitted } = collectFailure(
      [
        'TITLE,test server',
        'TIME,Mon Oct 21 09:23:08 2024,1700000000',
        'HEADER,CLIENT_LIST,Common Name,Bytes Received,Bytes Sent',
        'CLIENT_LIST,alice,abc,2'
      ].join('\n')
    );
    expect(failure).toBeInstanceOf(InvalidNumericValueError);
    expect(failure).toMatchObject({ value: 'abc', column: 'Bytes Received' });
    expect(emitted).toBe(0);
  });

  it('requires a header before table rows', () => {
    const { failure, emitted } = collectFailure('TITLE,test server\nCLIENT_LIST,alice,1,2\n');
    expect(failure).toBeInstanceOf(MissingHeaderError);
    expect(failure).toMatchObject({ section: 'CLIENT_LIST' });
    expect(emitted).toBe(0);
  });

  it('rejects rows whose width differs from the header', () => {
    const { failure } = collectFailure(
      'TITLE,test server\nHEADER,ROUTING_TABLE,Virtual Address,Common Name,Last Ref (time_t)\nROUTING_TABLE,10.8.0.2,alice\n'
    );
    expect(failure).toBeInstanceOf(HeaderArityMismatchError);
  });

  it('rejects unknown and malformed records', () => {
    for (const [text, tag] of [
      ['TITLE,test server\nFOO,bar\n', 'FOO'],
      ['TITLE,a,b\n', 'TITLE'],
      ['TITLE,test server\nTIME,1700000000\n', 'TIME'],
      ['TITLE,test server\nHEADER,CLIENT_LIST\n', 'HEADER'],
      ['TITLE,test server\nEND,now\n', 'END']
    ]) {
      const { failure } = collectFailure(text);
      expect(failure).toBeInstanceOf(UnsupportedRecordTypeError);
      expect(failure).toMatchObject({ tag, message: `unsupported key: "${tag}"` });
    }
  });

  it('rejects a non-numeric update time', () => {
    const { failure } = collectFailure('TITLE,test server\nTIME,Mon Oct 21 09:23:08 2024,soon\n');
    expect(failure).toBeInstanceOf(InvalidTimestampError);
  });
});

describe('server status, tab separated', () => {
  it('emits the same metrics as the comma separated form', () => {
    const result = collectText('server.status', readFixture('server-v3.status'));
    expect(result.dialect).toBe('server-v3');
    expect(result.samples).toEqual(expectedServerSamples('server.status'));
  });
});

describe('server status, titled sections', () => {
  it('fills the username label from the common name', () => {
    const received = collectText('server.status', readFixture('server-v2.status')).samples.filter(
      sample => sample.name === RECEIVED
    );
    expect(received.map(sample => [sample.labels[1], sample.labels[5]])).toEqual([
      ['alice', 'alice'],
      ['bob', 'bob']
    ]);
  });

  it('emits client metrics and the update time', () => {
    const result = collectText('v4.status', readFixture('server-v4.status'));
    expect(result.dialect).toBe('server-v4');
    expect(result.samples).toEqual([
      { name: UPDATE_TIME, value: 1729502588, labels: ['v4.status'] },
      {
        name: RECEIVED,
        value: 3860,
        labels: ['v4.status', 'alice', '2024-10-21 08:00:01', '198.51.100.10:51234', '', 'alice']
      },
      {
        name: SENT,
        value: 3447,
        labels: ['v4.status', 'alice', '2024-10-21 08:00:01', '198.51.100.10:51234', '', 'alice']
      },
      {
        name: RECEIVED,
        value: 12000,
        labels: ['v4.status', 'bob', '2024-10-21 08:30:00', '203.0.113.7:40000', '', 'bob']
      },
      {
        name: SENT,
        value: 8000,
        labels: ['v4.status', 'bob', '2024-10-21 08:30:00', '203.0.113.7:40000', '', 'bob']
      },
      { name: CONNECTED, value: 2, labels: ['v4.status'] }
    ]);
  });

  it('skips repeated label sets like the other server layouts', () => {
    const text = [
      'OpenVPN CLIENT LIST',
      'Common Name,Real Address,Bytes Received,Bytes Sent,Connected Since',
      'alice,198.51.100.10:51234,1,2,2024-10-21 08:00:01',
      'alice,198.51.100.10:51234,5,6,2024-10-21 08:00:01',
      'END'
    ].join('\n');
    const labels = ['s', 'alice', '2024-10-21 08:00:01', '198.51.100.10:51234', '', 'alice'];

    const result = collectText('s', text);
    expect(result.samples).toEqual([
      { name: RECEIVED, value: 1, labels },
      { name: SENT, value: 2, labels },
      { name: CONNECTED, value: 2, labels: ['s'] }
    ]);
    expect(result.debug).toEqual([
      'Metric entry with same labels already emitted',
      'Metric entry with same labels already emitted'
    ]);
  });

  it('reads route reference times when the table carries them', () => {
    const text = [
      'OpenVPN CLIENT LIST',
      'Updated,2024-02-29 00:00:00',
      'ROUTING TABLE',
      'Virtual Address,Common Name,Real Address,Last Ref (time_t)',
      '10.8.0.9,carol,192.0.2.1:1194,1709164790',
      'END'
    ].join('\n');
    expect(collectText('s', text).samples).toEqual([
      { name: UPDATE_TIME, value: 1709164800, labels: ['s'] },
      { name: ROUTE, value: 1709164790, labels: ['s', 'carol', '192.0.2.1:1194', '10.8.0.9'] },
      { name: CONNECTED, value: 0, labels: ['s'] }
    ]);
  });

  it('counts rows that arrive before their header without emitting them', () => {
    const text = 'OpenVPN CLIENT LIST\nalice,198.51.100.10:51234,3860\nEND\n';
    expect(collectText('s', text).samples).toEqual([{ name: CONNECTED, value: 1, labels: ['s'] }]);
  });

  it('stops reading at END', () => {
    const text = 'OpenVPN CLIENT LIST\nEND\nCommon Name,Bytes Received\nalice,1\n';
    expect(collectText('s', text).samples).toEqual([{ name: CONNECTED, value: 0, labels: ['s'] }]);
  });

  it('rejects a malformed update time', () => {
    const { failure, emitted } = collectFailure('OpenVPN CLIENT LIST\nUpdated,21/10/2024 09:23\n');
    expect(failure).toBeInstanceOf(InvalidTimestampError);
    expect(emitted).toBe(0);
  });

  it('rejects non-numeric byte counts', () => {
    const { failure } = collectFailure(
      'OpenVPN CLIENT LIST\nCommon Name,Bytes Received\nalice,lots\nEND\n'
    );
    expect(failure).toBeInstanceOf(InvalidNumericValueError);
  });
});

describe('client status', () => {
  it('emits every traffic counter and the update time', () => {
    const result = collectText('client.status', readFixture('client.status'));
    expect(result.dialect).toBe('client');
    expect(result.samples).toEqual([
      {
        name: UPDATE_TIME,
        value: new Date(2024, 9, 21, 9, 23, 8).getTime() / 1000,
        labels: ['client.status']
      },
      { name: 'openvpn_client_tun_tap_read_bytes_total', value: 1536, labels: ['client.status'] },
      { name: 'openvpn_client_tun_tap_write_bytes_total', value: 3072, labels: ['client.status'] },
      { name: 'openvpn_client_tcp_udp_read_bytes_total', value: 2048, labels: ['client.status'] },
      { name: 'openvpn_client_tcp_udp_write_bytes_total', value: 4096, labels: ['client.status'] },
      { name: 'openvpn_client_auth_read_bytes_total', value: 512, labels: ['client.status'] },
      { name: 'openvpn_client_pre_compress_bytes_total', value: 8192, labels: ['client.status'] },
      { name: 'openvpn_client_post_compress_bytes_total', value: 6144, labels: ['client.status'] },
      { name: 'openvpn_client_pre_decompress_bytes_total', value: 10240, labels: ['client.status'] },
      { name: 'openvpn_client_post_decompress_bytes_total', value: 12288, labels: ['client.status'] }
    ]);
  });

  it('reads a minimal document', () => {
    const text = 'OpenVPN STATISTICS\nUpdated,Sun Oct 20 09:23:08 2024\nTCP/UDP read bytes,1234\nEND\n';
    expect(collectText('c', text).samples).toEqual([
      { name: UPDATE_TIME, value: new Date(2024, 9, 20, 9, 23, 8).getTime() / 1000, labels: ['c'] },
      { name: 'openvpn_client_tcp_udp_read_bytes_total', value: 1234, labels: ['c'] }
    ]);
  });

  it('emits a repeated counter twice', () => {
    const text = 'OpenVPN STATISTICS\nAuth read bytes,1\nAuth read bytes,2\nEND\n';
    expect(collectText('c', text).samples.map(sample => sample.value)).toEqual([1, 2]);
  });

  it('rejects unknown keys, bad numbers and bad dates', () => {
    expect(collectFailure('OpenVPN STATISTICS\nBogus,1\n').failure).toBeInstanceOf(
      UnsupportedRecordTypeError
    );
    expect(collectFailure('OpenVPN STATISTICS\nEND,1\n').failure).toMatchObject({ tag: 'END' });
    expect(collectFailure('OpenVPN STATISTICS\nTUN/TAP read bytes,x\n').failure).toMatchObject({
      value: 'x',
      column: 'TUN/TAP read bytes'
    });
    expect(collectFailure('OpenVPN STATISTICS\nUpdated,yesterday\n').failure).toBeInstanceOf(
      InvalidTimestampError
    );
  });
});

describe('collectStatusFromStream', () => {
  it('detects the dialect across chunk boundaries', async () => {
    const emitter = new MeasurementBuffer();
    const dialect = await collectStatusFromStream('chunked', Readable.from(['TIT', 'LE,x\nEND\n']), {
      specs: createStatusSpecs(),
      emitter
    });
    expect(dialect).toBe('server-v2');
    expect(toSamples(emitter.measurements())).toEqual([{ name: CONNECTED, value: 0, labels: ['chunked'] }]);
  });

  it('rejects unrecognised documents without emitting', async () => {
    const emitter = new MeasurementBuffer();
    await expect(
      collectStatusFromStream('other', Readable.from([Buffer.from('hello world\n')]), {
        specs: createStatusSpecs(),
        emitter
      })
    ).rejects.toBeInstanceOf(UnrecognizedFormatError);
    expect(emitter.size).toBe(0);
  });
});
