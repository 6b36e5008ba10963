/**
 * ir.ts
 * Per-module intermediate representation produced by the AST normalizer.
 *
 * All lists preserve HDL declaration order. Expressions and statements are
 * discriminated unions so every consumer can match on `kind` exhaustively.
 */

import type { Origin } from './origin.js';

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type UnaryOp = '~' | '!' | '-' | '&' | '|' | '^';

export type BinaryOp =
  | '+' | '-' | '*' | '/' | '%'
  | '&' | '|' | '^'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '<<' | '>>' | '>>>'
  | '&&' | '||';

export type Expr =
  | { kind: 'ref'; name: string }
  | { kind: 'const'; text: string }
  | { kind: 'unary'; op: UnaryOp; operand: Expr }
  | { kind: 'binary'; op: BinaryOp; left: Expr; right: Expr }
  | { kind: 'ternary'; cond: Expr; whenTrue: Expr; whenFalse: Expr }
  /** Bit select when `lsb` is null, part select `[msb:lsb]` otherwise. */
  | { kind: 'select'; base: Expr; msb: Expr; lsb: Expr | null }
  /** Parts are MSB first, as written in `{a, b}`. */
  | { kind: 'concat'; parts: Expr[] }
  | { kind: 'replicate'; count: Expr; value: Expr }
  | { kind: 'call'; name: string; args: Expr[] }
  | { kind: 'opaque'; tag: string };

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export type LoopKind = 'for' | 'while' | 'repeat' | 'forever';

export interface CaseItem {
  /** Empty for the `default` item. */
  guards: Expr[];
  body: Stmt[];
}

export type Stmt =
  | { kind: 'assign'; blocking: boolean; target: Expr; value: Expr; origin: Origin }
  | { kind: 'if'; cond: Expr; then: Stmt[]; else: Stmt[] | null; origin: Origin }
  | { kind: 'case'; selector: Expr; items: CaseItem[]; origin: Origin }
  | { kind: 'loop'; loopKind: LoopKind; cond: Expr | null; body: Stmt[]; origin: Origin }
  | { kind: 'taskCall'; name: string; args: Expr[]; origin: Origin }
  | { kind: 'system'; name: string; origin: Origin }
  | { kind: 'unknown'; tag: string; origin: Origin };

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

export type PortDirection = 'in' | 'out' | 'inout' | 'unknown';

export interface PortDecl {
  name: string;
  direction: PortDirection;
  width: number;
  msb: number;
  lsb: number;
  origin: Origin;
}

export interface NetDecl {
  name: string;
  width: number;
  msb: number;
  lsb: number;
  origin: Origin;
}

export interface ParamDecl {
  name: string;
  value: Expr | null;
  origin: Origin;
}

export interface PortConnectionDecl {
  /** Named connection (`.a(x)`); null for positional connections. */
  port: string | null;
  /** 1-based positional index when the producer supplies one. */
  portIndex: number | null;
  /** Null for an explicitly open port (`.a()`). */
  expr: Expr | null;
  /** Connection as written, kept for unresolved instances. */
  text: string;
}

export interface InstanceDecl {
  name: string;
  moduleName: string;
  connections: PortConnectionDecl[];
  origin: Origin;
}

export type BlockKind = 'always' | 'initial' | 'assign';

export interface SensitivityItem {
  edge: 'posedge' | 'negedge' | 'level' | 'star';
  signal: string | null;
}

export interface BlockDecl {
  /** Module-local id, e.g. `always_0`, `assign_2`. */
  id: string;
  kind: BlockKind;
  /** Producer tag (`always_ff`, `contassign`, ...), lower-cased. */
  flavor: string;
  sensitivity: SensitivityItem[];
  body: Stmt[];
  origin: Origin;
}

export interface FunctionDecl {
  name: string;
  kind: 'function' | 'task';
  /** Input parameter names in declaration order. */
  params: string[];
  /** Implicit return variable (the function name) for functions. */
  returnVar: string | null;
  body: Stmt[];
  origin: Origin;
}

export interface ModuleDef {
  name: string;
  origin: Origin;
  /** Set when the producer marked the module as an elaboration top. */
  isTop: boolean;
  ports: PortDecl[];
  nets: NetDecl[];
  params: ParamDecl[];
  blocks: BlockDecl[];
  instances: InstanceDecl[];
  functions: FunctionDecl[];
}

/** A module the normalizer could not build. */
export interface RejectedModule {
  name: string | null;
  reason: string;
}

export interface NormalizedDesign {
  modules: ModuleDef[];
  rejected: RejectedModule[];
}
