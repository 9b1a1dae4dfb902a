// pattern: Functional Core

/**
 * Syntax tree of the sandbox language.
 * Constructs the policy rejects (imports, definitions, lambdas) still get
 * nodes so every violation in a block can be reported at once.
 */

export type BinaryOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';

export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in' | 'is' | 'is not';

export type FormattedValue = {
  value: Expr;
  conversion: 'r' | 's' | null;
  spec: string;
};

export type Slice = {
  kind: 'Slice';
  lower: Expr | null;
  upper: Expr | null;
  step: Expr | null;
};

export type Keyword = {
  name: string;
  value: Expr;
};

export type Expr =
  | { kind: 'Constant'; value: null | boolean | number | string; line: number }
  | { kind: 'FString'; parts: Array<string | FormattedValue>; line: number }
  | { kind: 'Name'; id: string; line: number }
  | { kind: 'List'; elements: Array<Expr>; line: number }
  | { kind: 'Tuple'; elements: Array<Expr>; line: number }
  | { kind: 'Dict'; keys: Array<Expr>; values: Array<Expr>; line: number }
  | {
      kind: 'ListComp';
      element: Expr;
      target: Expr;
      iter: Expr;
      conditions: Array<Expr>;
      line: number;
    }
  | { kind: 'BinOp'; op: BinaryOperator; left: Expr; right: Expr; line: number }
  | { kind: 'UnaryOp'; op: 'not' | '-' | '+'; operand: Expr; line: number }
  | { kind: 'BoolOp'; op: 'and' | 'or'; values: Array<Expr>; line: number }
  | {
      kind: 'Compare';
      left: Expr;
      ops: Array<CompareOperator>;
      comparators: Array<Expr>;
      line: number;
    }
  | { kind: 'IfExp'; test: Expr; body: Expr; orelse: Expr; line: number }
  | { kind: 'Call'; func: Expr; args: Array<Expr>; keywords: Array<Keyword>; line: number }
  | { kind: 'Attribute'; value: Expr; attr: string; line: number }
  | { kind: 'Subscript'; value: Expr; index: Expr | Slice; line: number }
  | { kind: 'Lambda'; params: Array<string>; body: Expr; line: number };

export type Stmt =
  | { kind: 'Expr'; value: Expr; line: number }
  | { kind: 'Assign'; targets: Array<Expr>; value: Expr; line: number }
  | { kind: 'AugAssign'; target: Expr; op: BinaryOperator; value: Expr; line: number }
  | { kind: 'If'; test: Expr; body: Array<Stmt>; orelse: Array<Stmt>; line: number }
  | { kind: 'For'; target: Expr; iter: Expr; body: Array<Stmt>; line: number }
  | { kind: 'While'; test: Expr; body: Array<Stmt>; line: number }
  | { kind: 'Break' | 'Continue' | 'Pass'; line: number }
  | { kind: 'Forbidden'; keyword: string; line: number };

export type Program = {
  body: Array<Stmt>;
};
