import type { Ident } from './intern.js';
import type { Spanned } from './source-span.js';

// ============================================================
// TYPES
// ============================================================

/** Primitive types named by the `int | char | bool | real | unit` keywords */
export type PrimType = 'Int' | 'Char' | 'Bool' | 'Real' | 'Unit';

const TYPE_KEYWORDS: Record<PrimType, string> = {
  Int: 'int',
  Char: 'char',
  Bool: 'bool',
  Real: 'real',
  Unit: '()',
};

/** Source rendering of a type; Unit renders as `()` */
export function formatType(ty: PrimType): string {
  return TYPE_KEYWORDS[ty];
}

// ============================================================
// LITERALS AND OPERATORS
// ============================================================

/**
 * Literal values. Int holds non-negative magnitudes up to 2^64 - 1;
 * negation is the Neg operator, never part of the literal.
 */
export type LiteralValue =
  | { readonly kind: 'Int'; readonly value: bigint }
  | { readonly kind: 'Char'; readonly value: string }
  | { readonly kind: 'Bool'; readonly value: boolean }
  | { readonly kind: 'Real'; readonly value: number }
  | { readonly kind: 'Unit' };

export type BinaryOp =
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Rem'
  | 'Eq'
  | 'NotEq'
  | 'Less'
  | 'LessEq'
  | 'Greater'
  | 'GreaterEq'
  | 'And'
  | 'Or';

/** Neg is written `~`, Not is written `not` */
export type UnaryOp = 'Neg' | 'Not';

/** Ref is written `&`, RefMut is written `&mut` */
export type BorrowKind = 'Ref' | 'RefMut';

// ============================================================
// EXPRESSIONS
// ============================================================

export interface LiteralNode {
  readonly type: 'Literal';
  readonly literal: LiteralValue;
}

export interface LocalNode {
  readonly type: 'Local';
  readonly name: Ident;
}

export interface UnaryExprNode {
  readonly type: 'Unary';
  readonly op: Spanned<UnaryOp>;
  readonly operand: Spanned<ExprNode>;
}

export interface BorrowNode {
  readonly type: 'Borrow';
  readonly kind: Spanned<BorrowKind>;
  readonly operand: Spanned<ExprNode>;
}

export interface BinaryExprNode {
  readonly type: 'Binary';
  readonly left: Spanned<ExprNode>;
  readonly op: Spanned<BinaryOp>;
  readonly right: Spanned<ExprNode>;
}

/** let stmt* in expr end */
export interface LetNode {
  readonly type: 'Let';
  readonly stmts: Spanned<StmtNode>[];
  readonly body: Spanned<ExprNode>;
}

/** if cond then expr else expr */
export interface IfNode {
  readonly type: 'If';
  readonly condition: Spanned<ExprNode>;
  readonly thenBranch: Spanned<ExprNode>;
  readonly elseBranch: Spanned<ExprNode>;
}

/**
 * Callee applied to one argument (`f x`).
 * Modelled for consumers; the grammar has no rule producing it yet.
 */
export interface ApplyNode {
  readonly type: 'Apply';
  readonly callee: Spanned<ExprNode>;
  readonly argument: Spanned<ExprNode>;
}

export type ExprNode =
  | LiteralNode
  | LocalNode
  | UnaryExprNode
  | BorrowNode
  | BinaryExprNode
  | LetNode
  | IfNode
  | ApplyNode;

// ============================================================
// STATEMENTS
// ============================================================

/** val name (: type)? = expr */
export interface ValBinding {
  readonly name: Spanned<Ident>;
  readonly ty: PrimType | null;
  readonly expr: Spanned<ExprNode>;
}

export interface ValStmtNode {
  readonly type: 'Val';
  readonly binding: ValBinding;
}

/** name := expr */
export interface AssignStmtNode {
  readonly type: 'Assign';
  readonly target: Spanned<Ident>;
  readonly expr: Spanned<ExprNode>;
}

/** while cond do stmt */
export interface WhileStmtNode {
  readonly type: 'While';
  readonly condition: Spanned<ExprNode>;
  readonly body: Spanned<StmtNode>;
}

export type StmtNode = ValStmtNode | AssignStmtNode | WhileStmtNode;

// ============================================================
// PARAMETERS
// ============================================================

export interface IdentParamNode {
  readonly type: 'Ident';
  readonly name: Ident;
}

/** `_` */
export interface WildcardParamNode {
  readonly type: 'Wildcard';
}

/** (param : type) */
export interface TypedParamNode {
  readonly type: 'Typed';
  readonly param: Spanned<ParamNode>;
  readonly ty: PrimType;
}

export type ParamNode = IdentParamNode | WildcardParamNode | TypedParamNode;

// ============================================================
// DECLARATIONS
// ============================================================

/** fun name param* (: type)? = expr */
export interface FuncNode {
  readonly name: Spanned<Ident>;
  readonly params: Spanned<ParamNode>[];
  readonly returnTy: Spanned<PrimType> | null;
  readonly body: Spanned<ExprNode>;
}

export interface ValDeclNode {
  readonly type: 'Val';
  readonly binding: ValBinding;
}

export interface FuncDeclNode {
  readonly type: 'Func';
  readonly func: FuncNode;
}

export type DeclNode = ValDeclNode | FuncDeclNode;
