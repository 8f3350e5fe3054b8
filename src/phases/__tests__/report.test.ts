import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import { JsonReportSink, type CampaignReport } from '../report.js';

function report(): CampaignReport {
  return {
    session_id: 'session_1_abc',
    target: 'example.com',
    scope: ['web'],
    final_analysis: 'Two services exposed.',
    summary: {
      totalOperations: 0,
      successfulOperations: 0,
      failedOperations: 0,
      successRate: null,
      phasesCompleted: [],
      targetsIdentified: 1,
      targetsCompromised: 0,
      totalVulnerabilities: 0,
      totalOpenPorts: 0,
    },
    targets: {
      '10.0.0.5': { hostname: null, open_ports: [], services: {}, vulnerabilities: [], exploited: false },
    },
    operations: [],
    completed_at: '2026-01-01T00:00:00.000Z',
  };
}

describe('JsonReportSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'campaign-report-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('names reports after the session', () => {
    expect(JsonReportSink.fileName('session_1_abc')).toBe('campaign_session_1_abc.json');
  });

  it('writes the report as JSON and returns its path', async () => {
    const outputDir = path.join(dir, 'reports');
    const location = await new JsonReportSink(outputDir).publish(report());

    expect(location).toBe(path.join(outputDir, 'campaign_session_1_abc.json'));
    expect(JSON.parse(fs.readFileSync(location, 'utf-8'))).toEqual(report());
  });
});
