/**
 * PhasorDebugLogger - Opt-in capture of every phasor resolution
 *
 * Enable this to record what each add() resolved to. The last session can be
 * exported as a test setup that replays the same adds.
 */

import type { Anchor, Phasor, PhasorSpec, Vector2 } from "@/types";

/**
 * Debug log entry for a single add() call.
 */
export interface PhasorDebugLog {
  timestamp: number;
  name: string;
  spec: PhasorSpec;
  /** Undefined when the add failed */
  result?: PhasorDebugInfo;
  error?: string;
}

export interface PhasorDebugInfo {
  start: Vector2;
  end: Vector2;
  magnitude: number;
  angleDeg: number;
  color: string;
}

class PhasorDebugLoggerImpl {
  private enabled = false;
  private logs: PhasorDebugLog[] = [];
  private maxLogs = 200;

  enable(): void {
    this.enabled = true;
    console.log("[PHASOR DEBUG] Logging enabled. Use PhasorDebugLogger.dump() to see logs.");
  }

  disable(): void {
    this.enabled = false;
    console.log("[PHASOR DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record a successful resolution.
   */
  logResolved(spec: PhasorSpec, phasor: Phasor): void {
    if (!this.enabled) return;

    this.push({
      timestamp: Date.now(),
      name: phasor.name,
      spec,
      result: {
        start: { ...phasor.start },
        end: { ...phasor.end },
        magnitude: phasor.magnitude,
        angleDeg: phasor.angleDeg,
        color: phasor.color,
      },
    });
  }

  /**
   * Record a failed resolution.
   */
  logFailed(name: string, spec: PhasorSpec, error: Error): void {
    if (!this.enabled) return;

    this.push({ timestamp: Date.now(), name, spec, error: error.message });
  }

  /**
   * Forget everything captured so far.
   */
  clear(): void {
    this.logs = [];
    console.log("[PHASOR DEBUG] Logs cleared.");
  }

  getLastLog(): PhasorDebugLog | null {
    return this.logs[this.logs.length - 1] ?? null;
  }

  getAllLogs(): readonly PhasorDebugLog[] {
    return this.logs;
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[PHASOR DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`${log.name} @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Spec:", log.spec);
      if (log.result) {
        console.log("Resolved:", log.result);
      }
      if (log.error) {
        console.log("Error:", log.error);
      }
      console.groupEnd();
    }
  }

  /**
   * Export the captured adds as registry calls (for creating test cases).
   * Failed adds are kept as comments.
   */
  exportAsTestSetup(): string {
    if (this.logs.length === 0) {
      return "// No log available";
    }

    const lines = this.logs.map((log) => {
      const call = `registry.add(${JSON.stringify(log.name)}, ${specToSource(log.spec)});`;
      if (log.error) return `// FAILED: ${log.error}\n// ${call}`;
      const r = log.result;
      const expectation = r
        ? ` // -> end (${r.end.x.toFixed(3)}, ${r.end.y.toFixed(3)}), |${r.magnitude.toFixed(3)}| ${r.angleDeg.toFixed(2)}°`
        : "";
      return call + expectation;
    });

    return `const registry = new PhasorRegistry();\n${lines.join("\n")}`;
  }

  private push(log: PhasorDebugLog): void {
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    const outcome = log.result
      ? `end (${log.result.end.x.toFixed(2)}, ${log.result.end.y.toFixed(2)})`
      : `failed: ${log.error ?? "unknown"}`;
    console.log(`[PHASOR DEBUG] #${this.logs.length} ${log.name} ${outcome}`);
  }
}

function anchorToSource(anchor: Anchor): string {
  if (anchor.kind === "relative") {
    return `{ kind: "relative", ref: ${JSON.stringify(anchor.ref)}, point: "${anchor.point}" }`;
  }
  return `{ kind: "absolute", x: ${anchor.x ?? 0}, y: ${anchor.y ?? 0} }`;
}

function specToSource(spec: PhasorSpec): string {
  const g = spec.geometry;
  const geometry =
    g.kind === "polar"
      ? `{ kind: "polar", magnitude: ${g.magnitude}, angleDeg: ${g.angleDeg} }`
      : `{ kind: "cartesian", endX: ${g.endX}, endY: ${g.endY} }`;

  const parts = [`geometry: ${geometry}`];
  if (spec.anchor) parts.push(`anchor: ${anchorToSource(spec.anchor)}`);
  if (spec.kind !== undefined) parts.push(`kind: ${JSON.stringify(spec.kind)}`);
  if (spec.color !== undefined) parts.push(`color: ${JSON.stringify(spec.color)}`);
  if (spec.label !== undefined) parts.push(`label: ${JSON.stringify(spec.label)}`);
  if (spec.labelOffset !== undefined) parts.push(`labelOffset: ${spec.labelOffset}`);
  if (spec.arrowWidth !== undefined) parts.push(`arrowWidth: ${spec.arrowWidth}`);
  return `{ ${parts.join(", ")} }`;
}

/**
 * Global debug logger instance.
 */
export const PhasorDebugLogger = new PhasorDebugLoggerImpl();
