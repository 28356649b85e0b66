import { Effect, Option, Schema } from "effect";
import { InvalidFilterError, UnknownOperatorError } from "../core/errors";
import { formatSoqlDateTime, parseInstant } from "../core/time";

export const ColumnOperand = Schema.Struct({
  operandType: Schema.Literal("column"),
  name: Schema.NonEmptyTrimmedString,
});

export const LiteralOperand = Schema.Struct({
  operandType: Schema.Literal("literal"),
  value: Schema.Union(Schema.String, Schema.Number, Schema.Boolean),
  litType: Schema.optionalWith(Schema.Literal("string", "number", "boolean", "date"), {
    default: () => "string" as const,
  }),
});

export const Operand = Schema.Union(ColumnOperand, LiteralOperand);
export type Operand = typeof Operand.Type;

export interface FilterStatement {
  readonly filterType: "statement";
  readonly lhs: Operand;
  readonly op: string;
  readonly rhs?: Operand;
}

export interface FilterGroup {
  readonly filterType: "group";
  readonly op: "AND" | "OR";
  readonly filters: ReadonlyArray<FilterNode>;
}

export type FilterNode = FilterStatement | FilterGroup;

interface FilterStatementEncoded {
  readonly filterType: "statement";
  readonly lhs: typeof Operand.Encoded;
  readonly op: string;
  readonly rhs?: typeof Operand.Encoded;
}

interface FilterGroupEncoded {
  readonly filterType: "group";
  readonly op: "AND" | "OR";
  readonly filters: ReadonlyArray<FilterNodeEncoded>;
}

type FilterNodeEncoded = FilterStatementEncoded | FilterGroupEncoded;

/**
 * Filter tree as configured. Unknown node shapes are rejected while
 * decoding, before any predicate is compiled.
 */
export const FilterNode: Schema.Schema<FilterNode, FilterNodeEncoded> = Schema.Union(
  Schema.Struct({
    filterType: Schema.Literal("statement"),
    lhs: Operand,
    op: Schema.String,
    rhs: Schema.optional(Operand),
  }),
  Schema.Struct({
    filterType: Schema.Literal("group"),
    op: Schema.Literal("AND", "OR"),
    filters: Schema.Array(
      Schema.suspend((): Schema.Schema<FilterNode, FilterNodeEncoded> => FilterNode)
    ),
  })
);

const BINARY_OPERATORS: Record<string, string> = {
  less_than: "<",
  less_than_equals: "<=",
  equals: "=",
  not_equals: "!=",
  greater_than_equals: ">=",
  greater_than: ">",
  starts_with: "LIKE",
  ends_with: "LIKE",
  contains: "LIKE",
  not_contains: "NOT LIKE",
};

const UNARY_OPERATORS: Record<string, string> = {
  is_null: "= null",
  is_not_null: "!= null",
};

export type SourceColumnTypes = Readonly<Record<string, string>>;

const quote = (value: string): string => `'${value.replace(/[\\']/g, (ch) => `\\${ch}`)}'`;

const likePattern = (op: string, value: string): string => {
  switch (op) {
    case "starts_with":
      return quote(`${value}%`);
    case "ends_with":
      return quote(`%${value}`);
    default:
      return quote(`%${value}%`);
  }
};

const LIKE_OPERATORS = new Set(["starts_with", "ends_with", "contains", "not_contains"]);

const lowerLiteral = (
  column: string,
  op: string,
  operand: typeof LiteralOperand.Type,
  columnTypes: SourceColumnTypes
): Effect.Effect<string, InvalidFilterError> => {
  const raw = String(operand.value).trim();
  const columnType = columnTypes[column];

  switch (operand.litType) {
    case "date": {
      // date columns reject a time component
      if (columnType !== "datetime") return Effect.succeed(raw);
      return Option.match(parseInstant(raw), {
        onNone: () =>
          Effect.fail(
            new InvalidFilterError({
              message: `Invalid filter: Field ${column} filter value of ${raw} is not a valid date`,
              field: column,
            })
          ),
        onSome: (instant) => Effect.succeed(formatSoqlDateTime(instant)),
      });
    }
    case "number": {
      const parsed = Number(raw);
      if (raw === "" || !Number.isFinite(parsed)) {
        return Effect.fail(
          new InvalidFilterError({
            message: `Invalid filter: Field ${column} filter value of ${raw} is not a number`,
            field: column,
          })
        );
      }
      return Effect.succeed(
        columnType === "int" || columnType === "long" ? String(Math.trunc(parsed)) : raw
      );
    }
    case "boolean": {
      const token = raw.toLowerCase();
      if (token !== "true" && token !== "false") {
        return Effect.fail(
          new InvalidFilterError({
            message: `Invalid filter: Field ${column} filter value of ${raw} is not a boolean`,
            field: column,
          })
        );
      }
      return Effect.succeed(token);
    }
    default:
      return Effect.succeed(LIKE_OPERATORS.has(op) ? likePattern(op, raw) : quote(raw));
  }
};

const compileStatement = (
  statement: FilterStatement,
  columnTypes: SourceColumnTypes
): Effect.Effect<string, UnknownOperatorError | InvalidFilterError> =>
  Effect.gen(function* () {
    const lhs = statement.lhs;
    if (lhs.operandType !== "column") {
      return yield* Effect.fail(
        new InvalidFilterError({
          message: "Invalid filter: the left side of a statement must be a column",
        })
      );
    }
    const column = lhs.name;

    const unary = UNARY_OPERATORS[statement.op];
    if (unary !== undefined) {
      return `(${column} ${unary})`;
    }

    const operator = BINARY_OPERATORS[statement.op];
    if (operator === undefined) {
      return yield* Effect.fail(
        new UnknownOperatorError({
          message: `Unknown filter operator: ${statement.op}`,
          operator: statement.op,
        })
      );
    }

    const rhs = statement.rhs;
    if (rhs === undefined) {
      return yield* Effect.fail(
        new InvalidFilterError({
          message: `Invalid filter: operator ${statement.op} on field ${column} needs a value`,
          field: column,
        })
      );
    }

    const value =
      rhs.operandType === "column"
        ? rhs.name
        : yield* lowerLiteral(column, statement.op, rhs, columnTypes);
    return `(${column} ${operator} ${value})`;
  });

/**
 * Lowers a filter tree into a SOQL predicate. Groups whose children all
 * compile to nothing compile to nothing themselves.
 */
export const compileFilter = (
  node: FilterNode,
  columnTypes: SourceColumnTypes
): Effect.Effect<Option.Option<string>, UnknownOperatorError | InvalidFilterError> => {
  if (node.filterType === "statement") {
    return compileStatement(node, columnTypes).pipe(Effect.map(Option.some));
  }
  return Effect.forEach(node.filters, (child) => compileFilter(child, columnTypes)).pipe(
    Effect.map((children) => {
      const compiled = children.flatMap((child) => (Option.isSome(child) ? [child.value] : []));
      return compiled.length === 0
        ? Option.none()
        : Option.some(`(${compiled.join(` ${node.op} `)})`);
    })
  );
};
