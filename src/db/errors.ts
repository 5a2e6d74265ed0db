/**
 * Clinic Management - Constraint Violation Errors
 *
 * The storage engine is the only source of integrity errors. These classes
 * give callers a typed view of the PostgreSQL error it raised, keyed by SQLSTATE.
 * Works with errors from both `pg` and PGlite, which share the same fields.
 */

export type ConstraintKind = "unique" | "foreign_key" | "check" | "not_null";

const SQLSTATE_KINDS: Record<string, ConstraintKind> = {
  "23505": "unique",
  "23503": "foreign_key",
  "23514": "check",
  "23502": "not_null",
};

type DriverErrorFields = {
  code?: string;
  constraint?: string;
  table?: string;
  column?: string;
  detail?: string;
  message?: string;
};

export class ConstraintViolationError extends Error {
  readonly kind: ConstraintKind;
  readonly code: string;
  readonly constraint: string | undefined;
  readonly table: string | undefined;
  readonly column: string | undefined;
  readonly detail: string | undefined;

  constructor(kind: ConstraintKind, code: string, fields: DriverErrorFields, cause: unknown) {
    super(fields.message ?? `${kind} constraint violated`, { cause });
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.constraint = fields.constraint;
    this.table = fields.table;
    this.column = fields.column;
    this.detail = fields.detail;
  }
}

/** Duplicate value in a unique column (username, national_id, codes, ...). */
export class UniqueViolationError extends ConstraintViolationError {}

/** Missing parent row, or a restricted parent still referenced (services in use). */
export class ForeignKeyViolationError extends ConstraintViolationError {}

/** Check constraint failed, e.g. `chk_appointment_times`. */
export class CheckViolationError extends ConstraintViolationError {}

export class NotNullViolationError extends ConstraintViolationError {}

const ERROR_CLASSES = {
  unique: UniqueViolationError,
  foreign_key: ForeignKeyViolationError,
  check: CheckViolationError,
  not_null: NotNullViolationError,
} satisfies Record<ConstraintKind, typeof ConstraintViolationError>;

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

function driverFields(err: unknown): DriverErrorFields | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  return {
    code: readString(err, "code"),
    constraint: readString(err, "constraint"),
    table: readString(err, "table"),
    column: readString(err, "column"),
    detail: readString(err, "detail"),
    message: readString(err, "message"),
  };
}

/**
 * Map a driver error to a typed constraint violation.
 * Looks through `cause` chains so wrapped query errors are recognized too.
 * Returns undefined for anything that is not an integrity violation.
 */
export function toConstraintViolation(err: unknown): ConstraintViolationError | undefined {
  if (err instanceof ConstraintViolationError) return err;

  const fields = driverFields(err);
  if (!fields) return undefined;

  const kind = fields.code ? SQLSTATE_KINDS[fields.code] : undefined;
  if (kind && fields.code) {
    return new ERROR_CLASSES[kind](kind, fields.code, fields, err);
  }

  if (err instanceof Error && err.cause !== undefined && err.cause !== err) {
    return toConstraintViolation(err.cause);
  }
  return undefined;
}

export function isConstraintViolation(err: unknown, kind?: ConstraintKind): boolean {
  const violation = toConstraintViolation(err);
  return violation !== undefined && (kind === undefined || violation.kind === kind);
}
