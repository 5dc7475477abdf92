/**
 * Diff Renderer
 *
 * Renders the file changes reported by the interpreter as colored,
 * line-numbered diffs for terminal display.
 */

import { diffLines, type Change } from "diff";
import pc from "picocolors";
import { splitLines, type FileChange } from "@memfs/core";

/** Default number of context lines around changes */
const DEFAULT_CONTEXT_LINES = 3;

/** Default maximum lines to show before truncating */
const DEFAULT_MAX_LINES = 100;

export interface DiffRenderOptions {
  /** Show old/new line numbers (default: true) */
  lineNumbers?: boolean;
  /** Unchanged lines kept around each change (default: 3) */
  contextLines?: number;
  /** Maximum rows before truncating (default: 100) */
  maxLines?: number;
}

type DiffRow =
  | { kind: "added" | "removed" | "context"; text: string; oldLine?: number; newLine?: number }
  | { kind: "gap"; skipped: number };

function formatLineNum(oldNum: number | undefined, newNum: number | undefined): string {
  const oldStr = oldNum !== undefined ? String(oldNum).padStart(4) : "    ";
  const newStr = newNum !== undefined ? String(newNum).padStart(4) : "    ";
  return `${pc.dim(oldStr)} ${pc.dim(newStr)} `;
}

/**
 * Turn diff hunks into rows, collapsing long unchanged runs to a gap.
 */
function toRows(changes: Change[], contextLines: number): DiffRow[] {
  const rows: DiffRow[] = [];
  let oldLine = 1;
  let newLine = 1;

  changes.forEach((change, index) => {
    const lines = splitLines(change.value);

    if (change.added) {
      for (const text of lines) rows.push({ kind: "added", text, newLine: newLine++ });
      return;
    }
    if (change.removed) {
      for (const text of lines) rows.push({ kind: "removed", text, oldLine: oldLine++ });
      return;
    }

    const keepHead = index === 0 ? 0 : contextLines;
    const keepTail = index === changes.length - 1 ? 0 : contextLines;
    const skipped = lines.length - keepHead - keepTail;

    lines.forEach((text, lineIndex) => {
      const visible = skipped <= 0 || lineIndex < keepHead || lineIndex >= lines.length - keepTail;
      if (visible) {
        rows.push({ kind: "context", text, oldLine, newLine });
      } else if (lineIndex === keepHead) {
        rows.push({ kind: "gap", skipped });
      }
      oldLine++;
      newLine++;
    });
  });

  return rows;
}

/**
 * Render a change as a colored diff.
 * A change without previous content renders every line as an addition.
 */
export function renderDiff(change: FileChange, options: DiffRenderOptions = {}): string {
  const {
    lineNumbers = true,
    contextLines = DEFAULT_CONTEXT_LINES,
    maxLines = DEFAULT_MAX_LINES,
  } = options;

  const rows = toRows(diffLines(change.before ?? "", change.after), contextLines);
  const output: string[] = [];

  for (const row of rows.slice(0, maxLines)) {
    if (row.kind === "gap") {
      output.push(pc.dim(`  ... (${row.skipped} unchanged)`));
      continue;
    }
    const prefix = lineNumbers ? formatLineNum(row.oldLine, row.newLine) : "";
    if (row.kind === "added") {
      output.push(pc.green(`${prefix}+ ${row.text}`));
    } else if (row.kind === "removed") {
      output.push(pc.red(`${prefix}- ${row.text}`));
    } else {
      output.push(pc.dim(`${prefix}  ${row.text}`));
    }
  }

  if (rows.length > maxLines) {
    output.push(pc.yellow(`... (truncated, showing first ${maxLines} lines)`));
  }

  return output.join("\n");
}

/**
 * Short "+added, -removed" summary of a change.
 */
export function getDiffSummary(change: FileChange): string {
  if (change.before === undefined) {
    return `+${splitLines(change.after).length} lines (new file)`;
  }

  let added = 0;
  let removed = 0;
  for (const part of diffLines(change.before, change.after)) {
    const count = splitLines(part.value).length;
    if (part.added) added += count;
    else if (part.removed) removed += count;
  }

  const parts: string[] = [];
  if (added > 0) parts.push(pc.green(`+${added}`));
  if (removed > 0) parts.push(pc.red(`-${removed}`));
  return parts.length > 0 ? parts.join(", ") : "no changes";
}
