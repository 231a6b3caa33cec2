import pc from 'picocolors';
import type { Finding, ScanOutcome } from '@tagscan/scanner';
import { precisionRate } from '@tagscan/scanner';
import { formatTable } from './table';

export interface ScanReport {
  root: string;
  strategy: string;
  outcome: ScanOutcome;
  /** Notes from file discovery, such as oversized files left out */
  notices: string[];
  cache?: { path: string; entries: number; resetReason?: string };
}

export interface CacheClearReport {
  path: string;
  removed: number;
}

const MAX_MESSAGE_WIDTH = 60;

function metadataOf(finding: Finding): string {
  const parts: string[] = [];
  if (finding.author) parts.push(`@${finding.author}`);
  if (finding.issue) parts.push(`#${finding.issue}`);
  if (finding.priority) parts.push(finding.priority);
  return parts.join(' ');
}

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderScan(report: ScanReport): void {
    if (this.isJson) {
      const { outcome } = report;
      console.log(
        JSON.stringify(
          {
            root: report.root,
            strategy: report.strategy,
            findings: outcome.findings,
            stats: outcome.stats,
            errors: outcome.errors,
            warnings: outcome.warnings,
            notices: report.notices,
            cancelled: outcome.cancelled,
          },
          null,
          2,
        ),
      );
      return;
    }
    this.renderScanHuman(report);
  }

  renderCacheCleared(report: CacheClearReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    console.log(`${pc.green('✔')} Cleared ${report.removed} cached entries from ${report.path}`);
  }

  private renderScanHuman(report: ScanReport): void {
    const { findings, stats, errors, warnings, cancelled } = report.outcome;

    if (findings.length > 0) {
      const rows = findings.map((f) => [
        `${f.file}:${f.line}`,
        f.custom ? pc.magenta(f.tag) : pc.yellow(f.tag),
        truncate(f.message, MAX_MESSAGE_WIDTH),
        metadataOf(f),
      ]);
      console.log(formatTable(rows, { head: ['Location', 'Tag', 'Message', 'Meta'] }));
    } else {
      console.log(pc.gray('No tags found.'));
    }

    console.log(pc.bold('\nSummary:'));
    console.log(`  ${stats.totalFindings} findings in ${stats.filesWithFindings} files`);
    const byTag = Object.entries(stats.byTag)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([tag, count]) => `${tag}: ${count}`);
    if (byTag.length > 0) {
      console.log(`  ${byTag.join(', ')}`);
    }
    console.log(
      `  Files: ${stats.filesScanned} scanned, ${stats.filesFromCache} from cache, ${stats.filesSkipped} skipped, ${stats.filesFailed} failed`,
    );
    if (report.strategy === 'ast') {
      const { candidates, kept, discarded, fallbacks } = stats.precision;
      const rate = precisionRate(stats.precision).toFixed(1);
      console.log(
        `  Verified: ${kept} of ${candidates} candidates kept (${rate}%), ${discarded} discarded, ${fallbacks} fallbacks`,
      );
    }
    console.log(`  Elapsed: ${stats.elapsedMs} ms`);

    if (report.cache?.resetReason) {
      console.log(pc.gray(`  Cache at ${report.cache.path} was reset (${report.cache.resetReason}).`));
    }

    for (const notice of report.notices) {
      console.error(`${pc.yellow('!')} ${notice}`);
    }
    for (const warning of warnings) {
      console.error(`${pc.yellow('!')} ${warning.file}: ${warning.message}`);
    }
    for (const error of errors) {
      console.error(`${pc.red('✖')} ${error.file}: [${error.code}] ${error.message}`);
    }
    if (cancelled) {
      console.error(pc.red('\nScan cancelled; results are partial.'));
    }
  }
}
