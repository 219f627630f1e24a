// Port space
export const MIN_PORT = 1;
export const MAX_PORT = 65535;
export const PORT_SPACE_SIZE = MAX_PORT - MIN_PORT + 1;

export const PROTOCOLS = ['tcp', 'udp'] as const;
export type Protocol = (typeof PROTOCOLS)[number];

export type PortState = 'used' | 'available' | 'hidden' | 'virtual-hidden';
export type PortSource = 'container' | 'system' | 'none';

export type DetectionMethod =
  | 'explicit-binding'
  | 'exposed-ports-config'
  | 'healthcheck-parse'
  | 'entrypoint-parse'
  | 'env-var-scan'
  | 'system-scan';

// Ordinal confidence per detection method, only used to break collisions.
// system-scan ties with entrypoint-parse so equal evidence favours the container.
export const CONFIDENCE: Record<DetectionMethod, number> = {
  'explicit-binding': 5,
  'exposed-ports-config': 4,
  'healthcheck-parse': 3,
  'entrypoint-parse': 2,
  'system-scan': 2,
  'env-var-scan': 1,
};

export function isProtocol(value: unknown): value is Protocol {
  return value === 'tcp' || value === 'udp';
}

export function isValidPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= MIN_PORT && value <= MAX_PORT;
}

// Container runtime

export interface PortBinding {
  hostIp: string;
  hostPort: number;
  containerPort: number;
  protocol: Protocol;
}

export interface ContainerMetadata {
  id: string;
  name: string;
  image: string;
  networkMode: string;
  bindings: PortBinding[];
  exposedPorts: string[];
  healthcheck: string[];
  entrypoint: string[];
  cmd: string[];
  env: string[];
}

// Host sockets

export interface ListeningSocket {
  port: number;
  protocol: Protocol;
  address: string;
  processName: string | null;
  pid: number | null;
}

// Merge input/output

export interface PortCandidate {
  port: number;
  protocol: Protocol;
  source: Exclude<PortSource, 'none'>;
  detectionMethod: DetectionMethod;
  containerName?: string;
  containerId?: string;
  containerInternalPort?: number;
  image?: string;
  processName?: string;
  pid?: number;
}

export interface PortRecord extends PortCandidate {
  state: PortState;
  confidence: number;
  serviceName: string | null;
}

export interface GapRange {
  protocol: Protocol;
  start: number;
  end: number;
  count: number;
}

export type LayoutEntry =
  | { kind: 'port'; record: PortRecord }
  | { kind: 'gap'; gap: GapRange };

export interface PortLayout {
  used: PortRecord[];
  gaps: GapRange[];
  entries: LayoutEntry[];
}

// Classified output

export interface PortRange {
  kind: 'range';
  protocol: Protocol;
  state: Extract<PortState, 'available' | 'virtual-hidden'>;
  start: number;
  end: number;
  count: number;
}

export type ViewEntry =
  | { kind: 'port'; record: PortRecord }
  | PortRange;

export type StateCounts = Record<PortState, number>;

export interface PortView {
  entries: ViewEntry[];
  hidden: PortRecord[];
  virtualHidden: PortRange[];
}

// Hidden ports

export interface HiddenPortEntry {
  protocol: Protocol;
  start: number;
  end: number;
}

export interface HidePortTarget {
  start: number;
  end: number;
  protocol?: Protocol;
}

export interface HiddenPortMutation {
  entries: HiddenPortEntry[];
  changed: number;
}

// Scan results

export type SourceName = 'container' | 'system';

export interface SourceWarning {
  source: SourceName;
  error: 'RuntimeUnavailable' | 'ScanUnavailable';
  message: string;
}

export interface PortSummary {
  totalUsed: number;
  totalAvailable: number;
  dockerContainers: number;
  byProtocol: Record<Protocol, StateCounts>;
}

export interface PortScan extends PortView {
  summary: PortSummary;
  degraded: boolean;
  warnings: SourceWarning[];
  scannedAt: string;
}
