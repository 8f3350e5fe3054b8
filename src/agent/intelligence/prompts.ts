// Oracle prompts for each campaign phase.
//
// Context is always a bounded slice of current state so prompt size stays
// flat as findings accumulate.

import type { CampaignLimits, Target, ToolInventory } from '../core/types.js';
import type { OperationsLog } from '../knowledge/operations-log.js';
import type { TargetRegistry } from '../knowledge/target-registry.js';

export interface PhasePrompt {
  prompt: string;
  systemPrompt: string;
}

export const PLANNING_SYSTEM_PROMPT =
  'You are an expert red team leader creating a comprehensive penetration testing strategy. Be specific about tools, techniques, and priorities.';

export const OSINT_SYSTEM_PROMPT =
  'You are executing OSINT. Provide a prioritized list of specific commands and tools. Put each command on its own line inside a fenced code block.';

export const ENUMERATION_SYSTEM_PROMPT =
  'You are performing network enumeration. Provide specific nmap commands and enumeration techniques. Put each command on its own line inside a fenced code block.';

export const VULNERABILITY_SYSTEM_PROMPT =
  'You are conducting vulnerability assessment. Provide specific vulnerability scanning commands. Put each command on its own line inside a fenced code block.';

export const EXPLOITATION_SYSTEM_PROMPT =
  'You are conducting authorized penetration testing exploitation. Provide specific exploit commands and Metasploit modules, one per line.';

export const POST_EXPLOITATION_SYSTEM_PROMPT =
  'You are conducting post-exploitation activities on an authorized engagement. Provide specific commands for privilege escalation and data gathering inside a fenced code block.';

export const REPORTING_SYSTEM_PROMPT =
  'You are creating a final penetration test report. Provide executive summary, key findings, risk assessment, and remediation recommendations.';

/**
 * Names of tools marked available, for the strategy prompts. Advisory only.
 */
export function availableToolNames(inventory: ToolInventory): string[] {
  return Object.entries(inventory)
    .filter(([, status]) => status.available)
    .map(([name]) => name);
}

function toolLine(inventory: ToolInventory): string {
  const tools = availableToolNames(inventory);
  return tools.length > 0 ? `Available tools: ${tools.join(', ')}` : 'Available tools: unknown';
}

function servicesSlice(target: Target, count: number): string {
  const entries = [...target.services].slice(0, count);
  if (entries.length === 0) return 'none identified';
  return entries.map(([port, service]) => `${port}=${service}`).join(', ');
}

export function planningPrompt(target: string, scope: readonly string[]): PhasePrompt {
  const scopeText = scope.length > 0 ? scope.join(', ') : 'Full authorized assessment';
  return {
    systemPrompt: PLANNING_SYSTEM_PROMPT,
    prompt: `Target: ${target}
Scope: ${scopeText}

Create a comprehensive penetration testing plan including:
1. OSINT reconnaissance strategy
2. Network enumeration approach
3. Vulnerability assessment priorities
4. Potential exploitation vectors
5. Post-exploitation objectives
6. Risk assessment and safety measures

Provide specific tools and techniques for each phase.`,
  };
}

export function osintPrompt(target: string, inventory: ToolInventory): PhasePrompt {
  return {
    systemPrompt: OSINT_SYSTEM_PROMPT,
    prompt: `Target: ${target}
${toolLine(inventory)}

Which OSINT tools should I run and in what order? Consider: whois, DNS recon, subdomain enumeration, email harvesting, certificate transparency.`,
  };
}

export function enumerationPrompt(ip: string, inventory: ToolInventory): PhasePrompt {
  return {
    systemPrompt: ENUMERATION_SYSTEM_PROMPT,
    prompt: `Target IP: ${ip}
${toolLine(inventory)}

Plan network enumeration: port scanning, service detection, SMB enumeration, SNMP enumeration. What's the optimal scanning strategy?`,
  };
}

export function vulnerabilityPrompt(target: Target, limits: CampaignLimits): PhasePrompt {
  return {
    systemPrompt: VULNERABILITY_SYSTEM_PROMPT,
    prompt: `Target: ${target.ip}
Open ports: ${target.openPorts.slice(0, limits.promptPorts).join(', ')}
Services: ${servicesSlice(target, limits.promptServices)}

Plan vulnerability assessment: NSE scripts, Nikto, directory brute force, etc.`,
  };
}

export function exploitationPrompt(target: Target, limits: CampaignLimits): PhasePrompt {
  const vulns = target.vulnerabilities.slice(0, limits.promptVulnerabilities);
  return {
    systemPrompt: EXPLOITATION_SYSTEM_PROMPT,
    prompt: `Target: ${target.ip}
Vulnerabilities:
${vulns.map((vuln) => `- ${vuln}`).join('\n')}

Plan exploitation using Metasploit, Hydra, or other tools. What exploits should I try?`,
  };
}

export function postExploitationPrompt(target: Target): PhasePrompt {
  return {
    systemPrompt: POST_EXPLOITATION_SYSTEM_PROMPT,
    prompt: `Compromised target: ${target.ip}
Access: ${target.shells.length > 0 ? target.shells[target.shells.length - 1] : 'unknown'}

Plan post-exploitation: privilege escalation, persistence, lateral movement, data gathering. What should I do next?`,
  };
}

/**
 * Closing analysis for a phase, built from the phase's own records.
 */
export function analysisPrompt(
  phase: string,
  operations: OperationsLog,
  registry: TargetRegistry,
  limits: CampaignLimits
): PhasePrompt {
  const records = operations.all().filter((record) => record.phase === phase);
  const successful = records.filter((record) => record.success === true).length;
  const targets = registry.ids();
  const shown = targets.slice(0, limits.promptTargets);
  const more = targets.length > shown.length ? ` (+${targets.length - shown.length} more)` : '';
  const vulnCount = registry.list().reduce((sum, target) => sum + target.vulnerabilities.length, 0);

  return {
    systemPrompt: `You are analyzing ${phase} results. Provide insights and strategy adjustments for the next phase.`,
    prompt: `Phase: ${phase}
Operations completed: ${records.length}
Successful operations: ${successful}

Current targets: ${shown.join(', ') || 'none'}${more}
Current vulnerabilities: ${vulnCount}

Analyze the results and recommend next steps for the following phase.`,
  };
}

export interface ReportingCounts {
  targets: number;
  vulnerabilities: number;
  compromised: number;
  operations: number;
}

export function reportingPrompt(counts: ReportingCounts): PhasePrompt {
  return {
    systemPrompt: REPORTING_SYSTEM_PROMPT,
    prompt: `Analyze complete penetration test results.
Targets: ${counts.targets}
Total vulnerabilities: ${counts.vulnerabilities}
Compromised: ${counts.compromised}
Operations executed: ${counts.operations}

Provide executive summary and recommendations.`,
  };
}
