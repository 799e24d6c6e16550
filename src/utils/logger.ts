/**
 * Live execution logger for noirlings.
 *
 * All output goes to stderr so stdout stays clean for `--json` output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function progress(message: string): void {
  write(`⏳ ${message}`);
}

export function success(message: string): void {
  write(`✅ ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function tool(message: string): void {
  write(`🔧 ${message}`);
}

export function proof(message: string): void {
  write(`🔐 ${message}`);
}

/** Raw passthrough, used for tool output and source excerpts. */
export function raw(message: string): void {
  write(message);
}
