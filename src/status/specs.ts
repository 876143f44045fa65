export type MetricKind = 'counter' | 'gauge';

export type MetricDescriptor = {
  readonly name: string;
  readonly help: string;
  readonly kind: MetricKind;
  readonly labelNames: readonly string[];
};

export type MetricFieldSpec = {
  /** Column in the status document the value is read from. */
  readonly column: string;
  readonly descriptor: MetricDescriptor;
};

export type SectionSpec = {
  /** Columns whose values become labels, after the status path label. */
  readonly labelColumns: readonly string[];
  readonly metrics: readonly MetricFieldSpec[];
};

export type SectionName = 'CLIENT_LIST' | 'ROUTING_TABLE';

export type StatusSpecs = {
  readonly statusUpdateTime: MetricDescriptor;
  readonly connectedClients: MetricDescriptor;
  readonly up: MetricDescriptor;
  readonly clientCounters: ReadonlyMap<string, MetricDescriptor>;
  readonly sections: ReadonlyMap<string, SectionSpec>;
};

export type StatusSpecsOptions = {
  namespace?: string;
  /** Label server metrics by common name only. */
  ignoreIndividuals?: boolean;
};

export const DEFAULT_NAMESPACE = 'openvpn';
export const STATUS_PATH_LABEL = 'status_path';

export function buildMetricName(namespace: string, subsystem: string, name: string): string {
  return [namespace, subsystem, name].filter(part => part.length > 0).join('_');
}

function describe(
  namespace: string,
  subsystem: string,
  name: string,
  kind: MetricKind,
  help: string,
  labelNames: readonly string[] = [STATUS_PATH_LABEL]
): MetricDescriptor {
  return Object.freeze({
    name: buildMetricName(namespace, subsystem, name),
    help,
    kind,
    labelNames: Object.freeze([...labelNames])
  });
}

const CLIENT_COUNTERS: ReadonlyArray<[column: string, name: string, help: string]> = [
  ['TUN/TAP read bytes', 'tun_tap_read_bytes_total', 'Total amount of TUN/TAP traffic read, in bytes.'],
  ['TUN/TAP write bytes', 'tun_tap_write_bytes_total', 'Total amount of TUN/TAP traffic written, in bytes.'],
  ['TCP/UDP read bytes', 'tcp_udp_read_bytes_total', 'Total amount of TCP/UDP traffic read, in bytes.'],
  ['TCP/UDP write bytes', 'tcp_udp_write_bytes_total', 'Total amount of TCP/UDP traffic written, in bytes.'],
  ['Auth read bytes', 'auth_read_bytes_total', 'Total amount of authentication traffic read, in bytes.'],
  ['pre-compress bytes', 'pre_compress_bytes_total', 'Total amount of data before compression, in bytes.'],
  ['post-compress bytes', 'post_compress_bytes_total', 'Total amount of data after compression, in bytes.'],
  ['pre-decompress bytes', 'pre_decompress_bytes_total', 'Total amount of data before decompression, in bytes.'],
  ['post-decompress bytes', 'post_decompress_bytes_total', 'Total amount of data after decompression, in bytes.']
];

/**
 * Builds the immutable metric registry shared by every parser invocation.
 */
export function createStatusSpecs(options: StatusSpecsOptions = {}): StatusSpecs {
  const namespace = options.namespace ?? DEFAULT_NAMESPACE;

  const clientCounters = new Map<string, MetricDescriptor>();
  for (const [column, name, help] of CLIENT_COUNTERS) {
    clientCounters.set(column, describe(namespace, 'client', name, 'counter', help));
  }

  let clientLabels: string[];
  let clientLabelColumns: string[];
  let routingLabels: string[];
  let routingLabelColumns: string[];
  if (options.ignoreIndividuals) {
    clientLabels = [STATUS_PATH_LABEL, 'common_name'];
    clientLabelColumns = ['Common Name'];
    routingLabels = [STATUS_PATH_LABEL, 'common_name'];
    routingLabelColumns = ['Common Name'];
  } else {
    clientLabels = [
      STATUS_PATH_LABEL,
      'common_name',
      'connection_time',
      'real_address',
      'virtual_address',
      'username'
    ];
    // the username label carries the common name, not the Username column
    clientLabelColumns = ['Common Name', 'Connected Since', 'Real Address', 'Virtual Address', 'Common Name'];
    routingLabels = [STATUS_PATH_LABEL, 'common_name', 'real_address', 'virtual_address'];
    routingLabelColumns = ['Common Name', 'Real Address', 'Virtual Address'];
  }

  const sections = new Map<string, SectionSpec>([
    [
      'CLIENT_LIST',
      Object.freeze({
        labelColumns: Object.freeze(clientLabelColumns),
        metrics: Object.freeze([
          Object.freeze({
            column: 'Bytes Received',
            descriptor: describe(
              namespace,
              'server',
              'client_received_bytes_total',
              'counter',
              'Amount of data received over a connection on the VPN server, in bytes.',
              clientLabels
            )
          }),
          Object.freeze({
            column: 'Bytes Sent',
            descriptor: describe(
              namespace,
              'server',
              'client_sent_bytes_total',
              'counter',
              'Amount of data sent over a connection on the VPN server, in bytes.',
              clientLabels
            )
          })
        ])
      })
    ],
    [
      'ROUTING_TABLE',
      Object.freeze({
        labelColumns: Object.freeze(routingLabelColumns),
        metrics: Object.freeze([
          Object.freeze({
            column: 'Last Ref (time_t)',
            descriptor: describe(
              namespace,
              'server',
              'route_last_reference_time_seconds',
              'gauge',
              'Time at which a route was last referenced, in seconds.',
              routingLabels
            )
          })
        ])
      })
    ]
  ]);

  return Object.freeze({
    statusUpdateTime: describe(
      namespace,
      '',
      'status_update_time_seconds',
      'gauge',
      'UNIX timestamp at which the OpenVPN statistics were updated.'
    ),
    connectedClients: describe(
      namespace,
      '',
      'server_connected_clients',
      'gauge',
      'Number Of Connected Clients'
    ),
    up: describe(namespace, '', 'up', 'gauge', "Whether scraping OpenVPN's metrics was successful."),
    clientCounters,
    sections
  });
}
