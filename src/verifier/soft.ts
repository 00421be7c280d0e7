import type { JsonValue } from "../events/types.ts";
import { EventAssertionError } from "../errors.ts";
import { containsData, hasKeyPath, jsonEquals } from "../json/match.ts";

// Collects assertion failures and reports them together.
export class SoftAssert {
  readonly failures: string[] = [];

  check(condition: boolean, message: string): void {
    if (!condition) this.failures.push(message);
  }

  hasKeyPath(obj: JsonValue, keyPath: string, sep = "."): void {
    this.check(hasKeyPath(obj, keyPath, sep), `missing key path: ${keyPath}`);
  }

  containsData(payload: JsonValue, pairs: Record<string, JsonValue>): void {
    this.check(containsData(payload, pairs), `payload does not contain ${JSON.stringify(pairs)}`);
  }

  equals(actual: JsonValue, expected: JsonValue): void {
    if (typeof actual !== typeof expected) {
      this.failures.push(`type mismatch: actual=${typeof actual}, expected=${typeof expected}`);
      return;
    }
    this.check(jsonEquals(actual, expected), `values differ: actual=${JSON.stringify(actual)}, expected=${JSON.stringify(expected)}`);
  }

  raiseIfAny(): void {
    if (!this.failures.length) return;
    const lines = this.failures.map((f) => `- ${f}`).join("\n");
    throw new EventAssertionError(`soft assertion failures (total ${this.failures.length}):\n${lines}`);
  }
}
