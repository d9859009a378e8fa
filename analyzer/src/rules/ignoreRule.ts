import { TimeConstraint } from "./timeConstraint";
import { ConfigurationError } from "../errors";

export const ENVIRONMENT_PLACEHOLDER = "[#env#]";
export const ALARM_NAME_PATH = "attachments.title.alarm_name";

/** Parsed form of an ignore rule's field path. */
export type RulePath =
  | { kind: "all" }
  | { kind: "text" }
  | { kind: "attachments"; field: string }
  | { kind: "files"; field: string }
  | { kind: "alarmName" };

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function parseRulePath(path: string): RulePath {
  if (path === "*") return { kind: "all" };
  if (path === "text") return { kind: "text" };
  if (path === ALARM_NAME_PATH) return { kind: "alarmName" };

  const parts = path.split(".");
  const [root, field] = parts;
  if (
    parts.length === 2 &&
    (root === "attachments" || root === "files") &&
    FIELD_NAME.test(field)
  ) {
    return { kind: root, field };
  }

  throw new ConfigurationError(
    `Unsupported path '${path}'. Expected "*", "text", "attachments.<field>", "files.<field>" or "${ALARM_NAME_PATH}"`,
    "path",
  );
}

export interface IgnoreRuleOptions {
  pattern: string;
  path?: string;
  environments?: string[];
  reason?: string;
  validity?: TimeConstraint;
  exclusions?: TimeConstraint;
}

export class IgnoreRule {
  readonly pattern: string;
  readonly path: string;
  readonly parsedPath: RulePath;
  readonly environments: readonly string[];
  readonly reason?: string;
  readonly validity: TimeConstraint;
  readonly exclusions: TimeConstraint;

  constructor(options: IgnoreRuleOptions) {
    if (!options.pattern) {
      throw new ConfigurationError("Ignore rule pattern cannot be empty", "pattern");
    }
    this.pattern = options.pattern;
    this.path = options.path ?? "*";
    this.parsedPath = parseRulePath(this.path);
    this.environments = [...(options.environments ?? [])];
    this.reason = options.reason;
    this.validity = options.validity ?? new TimeConstraint();
    this.exclusions = options.exclusions ?? new TimeConstraint();
  }

  appliesToEnvironment(environment: string): boolean {
    return (
      this.environments.length === 0 || this.environments.includes(environment)
    );
  }

  hasTimeConstraints(): boolean {
    return !this.validity.isEmpty() || !this.exclusions.isEmpty();
  }

  /**
   * True when the validity constraint matches (or is empty) and the
   * exclusions constraint does not. A rule carrying any time constraint
   * never applies to an alarm without a timestamp.
   */
  isValidAt(timestamp: Date | null): boolean {
    if (!timestamp) {
      return !this.hasTimeConstraints();
    }
    if (!this.validity.isEmpty() && !this.validity.matches(timestamp)) {
      return false;
    }
    if (!this.exclusions.isEmpty() && this.exclusions.matches(timestamp)) {
      return false;
    }
    return true;
  }

  expandEnvironmentPlaceholders(environment: string): string {
    return this.pattern.split(ENVIRONMENT_PLACEHOLDER).join(environment);
  }

  describeReason(): string {
    if (this.reason) {
      return this.reason;
    }
    if (this.path === "*") {
      return `Pattern '${this.pattern}' found (wildcard search)`;
    }
    return `Pattern '${this.pattern}' found in ${this.path}`;
  }

  equals(other: IgnoreRule): boolean {
    return (
      this.pattern === other.pattern &&
      this.path === other.path &&
      this.environments.length === other.environments.length &&
      this.environments.every((env, i) => env === other.environments[i]) &&
      this.reason === other.reason &&
      this.validity.equals(other.validity) &&
      this.exclusions.equals(other.exclusions)
    );
  }

  toString(): string {
    const env =
      this.environments.length > 0
        ? `, environments=[${this.environments.join(", ")}]`
        : "";
    const reason = this.reason ? `, reason='${this.reason}'` : "";
    const validity = this.validity.isEmpty()
      ? ""
      : `, validity=${this.validity}`;
    const exclusions = this.exclusions.isEmpty()
      ? ""
      : `, exclusions=${this.exclusions}`;
    return `IgnoreRule(pattern='${this.pattern}', path='${this.path}'${env}${reason}${validity}${exclusions})`;
  }
}

/** Rule set used for a product whose configuration lists no ignore rules. */
export const DEFAULT_IGNORE_RULES: readonly IgnoreRule[] = Object.freeze([
  new IgnoreRule({ pattern: "AWS Notification Message", path: "files.name" }),
]);
