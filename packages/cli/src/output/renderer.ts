import pc from 'picocolors';
import { formatCodePoint, type Finding, type ScanResult, type WhitelistStore } from '@unilist/core';
import { printTable } from './index';

export interface OutputRendererOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * JSON document printed for `scan` and `check` under `--json`.
 */
export interface ScanReport {
  command: 'scan' | 'check';
  findings: Finding[];
  linesScanned: number;
  filesWithFindings: string[];
  whitelistPath: string;
  persisted: boolean;
}

export function toScanReport(command: ScanReport['command'], result: ScanResult): ScanReport {
  return {
    command,
    findings: result.findings,
    linesScanned: result.linesScanned,
    filesWithFindings: result.filesWithFindings,
    whitelistPath: result.whitelistPath,
    persisted: result.persisted,
  };
}

export function formatFinding(finding: Finding): string {
  return `New Unicode character found: ${finding.file}:${finding.lineNumber} - ${formatCodePoint(finding.codePoint)}`;
}

export class OutputRenderer {
  private readonly isJson: boolean;
  private readonly verbose: boolean;

  constructor(options: OutputRendererOptions = {}) {
    this.isJson = options.json ?? false;
    this.verbose = options.verbose ?? false;
  }

  /** Prints one report line as soon as a finding is made; silent under --json. */
  finding(finding: Finding): void {
    if (this.isJson) {
      return;
    }
    console.log(formatFinding(finding));
    if (this.verbose) {
      console.log(pc.dim(`  character: ${JSON.stringify(finding.char)}`));
    }
  }

  renderScan(result: ScanResult, whitelistLabel: string): void {
    if (this.isJson) {
      console.log(JSON.stringify(toScanReport('scan', result), null, 2));
      return;
    }
    console.log(`Scan complete. Whitelist updated in ${whitelistLabel} file.`);
  }

  renderCheck(result: ScanResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(toScanReport('check', result), null, 2));
      return;
    }

    const count = result.findings.length;
    if (count === 0) {
      console.log('Check complete. No new Unicode characters found.');
      return;
    }
    console.log(`Check complete. ${count} new Unicode character(s) found.`);
    console.log(pc.yellow(`Run ${pc.cyan('unilist scan')} to whitelist them.`));
  }

  renderList(store: WhitelistStore): void {
    if (this.isJson) {
      console.log(JSON.stringify(store.toJSON(), null, 2));
      return;
    }

    const files = store.files();
    if (files.length === 0) {
      console.log(pc.gray(`Whitelist ${store.path} is empty.`));
      return;
    }

    printTable(
      files.map((file) => {
        const codePoints = store.codePointsFor(file);
        return {
          file,
          count: codePoints.length,
          codePoints: codePoints.map(formatCodePoint).join(' '),
        };
      }),
      { head: ['File', 'Count', 'Code points'] },
    );
  }
}
