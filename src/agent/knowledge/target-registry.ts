/**
 * TargetRegistry - shared map from target address to accumulated findings.
 *
 * Owned by the host and referenced by the orchestrator. All mutations are
 * insert / append / dedup on a single field, never whole-record replacement,
 * so overlapping reports from concurrently completing commands merge
 * instead of clobbering each other. `exploited` is a latch: it can be set,
 * never cleared.
 */

import type { Target, TargetDocument } from '../core/types.js';
import { UnknownTargetError } from '../core/errors.js';

/** Vulnerabilities carried per target in an export */
export const EXPORT_VULNERABILITY_LIMIT = 10;

/** Mutable record behind each Target snapshot */
interface TargetState {
  ip: string;
  hostname?: string;
  openPorts: number[];
  services: Map<number, string>;
  vulnerabilities: string[];
  exploited: boolean;
  shells: string[];
  credentials: string[];
  notes: string[];
}

function createTarget(ip: string, hostname?: string): TargetState {
  return {
    ip,
    hostname,
    openPorts: [],
    services: new Map(),
    vulnerabilities: [],
    exploited: false,
    shells: [],
    credentials: [],
    notes: [],
  };
}

function snapshot(state: TargetState): Target {
  return Object.freeze({
    ip: state.ip,
    hostname: state.hostname,
    openPorts: Object.freeze([...state.openPorts]),
    services: new Map(state.services),
    vulnerabilities: Object.freeze([...state.vulnerabilities]),
    exploited: state.exploited,
    shells: Object.freeze([...state.shells]),
    credentials: Object.freeze([...state.credentials]),
    notes: Object.freeze([...state.notes]),
  });
}

function appendUnique<T>(list: T[], value: T): boolean {
  if (list.includes(value)) return false;
  list.push(value);
  return true;
}

export class TargetRegistry {
  private targets: Map<string, TargetState> = new Map();

  get size(): number {
    return this.targets.size;
  }

  isEmpty(): boolean {
    return this.targets.size === 0;
  }

  has(ip: string): boolean {
    return this.targets.has(ip);
  }

  /**
   * Frozen snapshot of one target; later findings do not show up in it.
   */
  get(ip: string): Target | undefined {
    const state = this.targets.get(ip);
    return state ? snapshot(state) : undefined;
  }

  /**
   * Target addresses in insertion order.
   */
  ids(): string[] {
    return [...this.targets.keys()];
  }

  list(): Target[] {
    return [...this.targets.values()].map(snapshot);
  }

  /**
   * @throws UnknownTargetError
   */
  isExploited(ip: string): boolean {
    return this.require(ip).exploited;
  }

  /**
   * Adds a target on first discovery.
   *
   * @returns false when the address is already registered (nothing changes)
   */
  add(ip: string, hostname?: string): boolean {
    if (this.targets.has(ip)) return false;
    this.targets.set(ip, createTarget(ip, hostname));
    return true;
  }

  /**
   * Host-side removal; the orchestrator never deletes targets.
   */
  remove(ip: string): boolean {
    return this.targets.delete(ip);
  }

  /** Fills in the hostname only if none is known yet. */
  setHostnameIfMissing(ip: string, hostname: string): void {
    const target = this.require(ip);
    if (!target.hostname) target.hostname = hostname;
  }

  addPort(ip: string, port: number): boolean {
    return appendUnique(this.require(ip).openPorts, port);
  }

  /**
   * Records a service descriptor for a port. A port keeps its first
   * non-empty descriptor; later reports for the same port are ignored.
   */
  addService(ip: string, port: number, descriptor: string): boolean {
    const target = this.require(ip);
    appendUnique(target.openPorts, port);
    if (!descriptor || target.services.has(port)) return false;
    target.services.set(port, descriptor);
    return true;
  }

  addVulnerability(ip: string, description: string): boolean {
    return appendUnique(this.require(ip).vulnerabilities, description);
  }

  addCredential(ip: string, credential: string): boolean {
    return appendUnique(this.require(ip).credentials, credential);
  }

  addNote(ip: string, note: string): void {
    this.require(ip).notes.push(note);
  }

  /**
   * Sets the exploited latch and appends a shell descriptor.
   */
  markExploited(ip: string, shell: string): void {
    const target = this.require(ip);
    target.exploited = true;
    appendUnique(target.shells, shell);
  }

  /**
   * JSON-safe snapshot keyed by address.
   */
  export(): Record<string, TargetDocument> {
    const data: Record<string, TargetDocument> = {};
    for (const [ip, target] of this.targets) {
      data[ip] = {
        hostname: target.hostname ?? null,
        open_ports: [...target.openPorts],
        services: Object.fromEntries(
          [...target.services].map(([port, service]) => [String(port), service])
        ),
        vulnerabilities: target.vulnerabilities.slice(0, EXPORT_VULNERABILITY_LIMIT),
        exploited: target.exploited,
        shells: [...target.shells],
        credentials: [...target.credentials],
        notes: [...target.notes],
      };
    }
    return data;
  }

  /**
   * Loads targets from an export. Addresses already present are left alone.
   *
   * @returns number of targets created
   */
  import(data: Record<string, Partial<TargetDocument>>): number {
    let imported = 0;
    for (const [ip, doc] of Object.entries(data)) {
      if (!this.add(ip, doc.hostname ?? undefined)) continue;
      imported++;

      for (const port of doc.open_ports ?? []) {
        if (Number.isInteger(port)) this.addPort(ip, port);
      }
      for (const [port, service] of Object.entries(doc.services ?? {})) {
        const portNumber = parseInt(port, 10);
        if (!Number.isNaN(portNumber)) this.addService(ip, portNumber, service);
      }
      for (const vuln of doc.vulnerabilities ?? []) this.addVulnerability(ip, vuln);
      for (const credential of doc.credentials ?? []) this.addCredential(ip, credential);
      for (const note of doc.notes ?? []) this.addNote(ip, note);
      if (doc.exploited) {
        const target = this.require(ip);
        target.exploited = true;
        for (const shell of doc.shells ?? []) appendUnique(target.shells, shell);
      }
    }
    return imported;
  }

  /**
   * @throws UnknownTargetError
   */
  private require(ip: string): TargetState {
    const target = this.targets.get(ip);
    if (!target) throw new UnknownTargetError(ip);
    return target;
  }
}
