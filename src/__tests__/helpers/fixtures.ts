// src/__tests__/helpers/fixtures.ts
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';

export interface ScaFixture {
  /** Per-UE cbrReceivedThroughput:mean values. */
  throughputs?: number[];
  /** Per-UE cbrFrameDelay:mean values. */
  delays?: number[];
  /** [gnb index, CNProcDemand:mean] pairs. */
  procDemand?: Array<[number, number]>;
  extra?: string[];
}

export function scaText(f: ScaFixture): string {
  const lines = [
    'version 3',
    'run TrainingToy1-0-20250101-10:00:00-1234',
    'attr configname TrainingToy1',
    'attr repetition 0',
    '',
  ];
  (f.throughputs || []).forEach((v, i) =>
    lines.push(`scalar Net.ue[${i}].app[0] cbrReceivedThroughput:mean ${v}`),
  );
  (f.delays || []).forEach((v, i) =>
    lines.push(`scalar Net.ue[${i}].app[0] cbrFrameDelay:mean ${v}`),
  );
  for (const [gnb, v] of f.procDemand || []) {
    lines.push(`scalar Net.gnb${gnb}.cellularNic.mac CNProcDemand:mean ${v}`);
  }
  lines.push(...(f.extra || []));
  return lines.join('\n') + '\n';
}

export async function writeSca(filePath: string, f: ScaFixture) {
  await fs.outputFile(filePath, scaText(f), 'utf8');
  return filePath;
}

export const makeTempDir = (prefix = 'sweep-lab-') =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));
