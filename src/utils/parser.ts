// Tool output parsing - turns raw command output into registry findings

export interface Host {
  ip: string;
  hostname?: string;
  ports: Port[];
}

export interface Port {
  port: number;
  protocol: 'tcp' | 'udp';
  state: string;
  service: string;
  version?: string;
}

export interface VulnerabilityFinding {
  port?: number;
  description: string;
}

const VULN_INDICATORS = [/State:\s*VULNERABLE/i, /\bVULNERABLE\b/, /\bCVE-\d{4}-\d{4,}\b/i];

/** NSE reports a checked-and-clean result as "State: NOT VULNERABLE" */
const NEGATIVE_RE = /\bNOT\s+VULNERABLE\b/i;

const IPV4_RE = /\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/g;

const PORT_LINE_RE = /^(\d+)\/(tcp|udp)\s+(\S+)\s+(\S+)(?:\s+(.*))?$/;

/** Longest vulnerability line kept verbatim */
const MAX_FINDING_CHARS = 200;

export class OutputParser {
  /**
   * Parses nmap normal-format output into hosts and their ports.
   *
   * Port lines that appear before any "Nmap scan report for" header are
   * attributed to `defaultIp` when one is given.
   */
  static parseHosts(output: string, defaultIp?: string): Host[] {
    const hosts: Host[] = [];
    let currentHost: Host | null = defaultIp ? { ip: defaultIp, ports: [] } : null;

    for (const rawLine of output.split('\n')) {
      const line = rawLine.trim();

      if (line.includes('Nmap scan report for')) {
        if (currentHost && (currentHost.ports.length > 0 || currentHost.ip !== defaultIp)) {
          hosts.push(currentHost);
        }

        const hostnameMatch = line.match(/for ([^\s]+) \(([0-9.]+)\)/);
        const ipMatch = line.match(/for ([0-9.]+)\s*$/);

        if (hostnameMatch) {
          currentHost = { hostname: hostnameMatch[1], ip: hostnameMatch[2], ports: [] };
        } else if (ipMatch) {
          currentHost = { ip: ipMatch[1], ports: [] };
        } else {
          currentHost = null;
        }
        continue;
      }

      const portMatch = currentHost ? line.match(PORT_LINE_RE) : null;
      if (currentHost && portMatch) {
        const [, port, protocol, state, service, version] = portMatch;
        currentHost.ports.push({
          port: parseInt(port, 10),
          protocol: protocol === 'udp' ? 'udp' : 'tcp',
          state,
          service,
          version: version?.trim() || undefined,
        });
      }
    }

    if (currentHost && (currentHost.ports.length > 0 || currentHost.ip !== defaultIp)) {
      hosts.push(currentHost);
    }

    return hosts;
  }

  /**
   * Service descriptor stored in the registry: "<service> <version>".
   */
  static describeService(port: Port): string {
    return `${port.service} ${port.version ?? ''}`.trim();
  }

  /**
   * Finds lines carrying vulnerability indicators (NSE "VULNERABLE", CVE ids).
   *
   * A finding is tied to the most recent port line above it, if any.
   */
  static parseVulnerabilities(output: string): VulnerabilityFinding[] {
    const findings: VulnerabilityFinding[] = [];
    const seen = new Set<string>();
    let currentPort: number | undefined;

    for (const rawLine of output.split('\n')) {
      const line = rawLine.replace(/^[|_\s]+/, '').trim();
      if (!line) continue;

      const portMatch = line.match(PORT_LINE_RE);
      if (portMatch) {
        currentPort = parseInt(portMatch[1], 10);
        continue;
      }

      if (NEGATIVE_RE.test(line)) continue;
      if (!VULN_INDICATORS.some((re) => re.test(line))) continue;

      const description = line.slice(0, MAX_FINDING_CHARS);
      const key = `${currentPort ?? ''}|${description}`;
      if (seen.has(key)) continue;
      seen.add(key);
      findings.push({ port: currentPort, description });
    }

    return findings;
  }

  /**
   * Registry string for a finding: "PORT 80: <line>" or just the line.
   */
  static describeVulnerability(finding: VulnerabilityFinding): string {
    return finding.port !== undefined
      ? `PORT ${finding.port}: ${finding.description}`
      : finding.description;
  }

  /**
   * Unique routable-looking IPv4 addresses in first-seen order.
   *
   * Loopback, unspecified and broadcast addresses are skipped.
   */
  static parseAddresses(output: string): string[] {
    const addresses: string[] = [];
    for (const match of output.matchAll(IPV4_RE)) {
      const ip = match[0];
      if (ip.startsWith('127.') || ip === '0.0.0.0' || ip === '255.255.255.255') continue;
      if (!addresses.includes(ip)) addresses.push(ip);
    }
    return addresses;
  }
}
