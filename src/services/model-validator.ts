/**
 * model-validator.ts
 * Invariant checks over a finished build.
 * Throws `ValidationError` on the first violation found.
 *
 * Rules:
 *   1. Every resolved connection names a port of the child definition.
 *   2. Instance tree: depth bounded by the module count, truncated and
 *      unresolved nodes have no children.
 *   3. Every net is covered by exactly one bus edge.
 *   4. Bus edges of one vector never overlap.
 *   5. A net with an inout endpoint, or with both in and out endpoints, is
 *      bidirectional.
 *   6. Fragment ids are unique per module.
 *   7. Level ids are unique; navigation children exist.
 */

import type { BehavioralModel, Fragment } from '../models/behavior.js';
import type { GraphDescription } from '../models/graph-description.js';
import type { HierarchyModel, InstanceNode } from '../models/hierarchy.js';
import type { StructuralModel } from '../models/structure.js';

export interface ValidatableModel {
  hierarchy: HierarchyModel;
  structure: StructuralModel;
  behavior: BehavioralModel;
  graph: GraphDescription;
}

export class ModelValidator {
  static validate(model: ValidatableModel): void {
    ModelValidator._validateBindings(model.hierarchy);
    ModelValidator._validateTree(model.hierarchy);
    ModelValidator._validateBusCoverage(model.structure);
    ModelValidator._validateDirections(model.structure);
    ModelValidator._validateFragments(model.behavior);
    ModelValidator._validateGraph(model.graph);
  }

  // ---------------------------------------------------------------------------
  // Rule 1: connections name existing child ports
  // ---------------------------------------------------------------------------

  private static _validateBindings(h: HierarchyModel): void {
    h.bindings.forEach((list, parentIdx) => {
      const parent = h.moduleTable[parentIdx]?.name ?? `#${parentIdx}`;
      for (const b of list) {
        if (b.childIndex === null) continue;
        const child = h.moduleTable[b.childIndex];
        if (child === undefined) {
          throw new ValidationError(`Rule 1 violation: ${parent}.${b.instanceName} binds to missing module #${b.childIndex}.`);
        }
        for (const c of b.connections) {
          if (!child.ports.some((p) => p.name === c.port)) {
            throw new ValidationError(
              `Rule 1 violation: ${parent}.${b.instanceName} connects "${c.port}", which "${child.name}" does not declare.`,
            );
          }
        }
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Rule 2: instance tree shape
  // ---------------------------------------------------------------------------

  private static _validateTree(h: HierarchyModel): void {
    const limit = h.moduleTable.length;
    const visit = (node: InstanceNode): void => {
      if (node.depth > limit) {
        throw new ValidationError(`Rule 2 violation: "${node.path}" is deeper (${node.depth}) than the module count (${limit}).`);
      }
      if ((node.truncated || node.unresolved) && node.children.length > 0) {
        throw new ValidationError(`Rule 2 violation: "${node.path}" is not expanded but has children.`);
      }
      node.children.forEach(visit);
    };
    h.roots.forEach(visit);
  }

  // ---------------------------------------------------------------------------
  // Rules 3 + 4: bus edge coverage
  // ---------------------------------------------------------------------------

  private static _validateBusCoverage(s: StructuralModel): void {
    for (const m of s.modules) {
      const netNames = m.nets.map((n) => n.name).sort();
      const covered = m.busEdges.flatMap((e) => e.nets).sort();
      if (netNames.length !== covered.length || netNames.some((n, i) => n !== covered[i])) {
        throw new ValidationError(
          `Rule 3 violation: bus edges of "${m.moduleName}" cover ${covered.length} bits, module has ${netNames.length} nets.`,
        );
      }

      const ranges = new Map<string, Array<[number, number]>>();
      for (const e of m.busEdges) {
        if (e.lsb === null || e.msb === null || e.conflict) continue;
        const list = ranges.get(e.baseName) ?? [];
        for (const [lo, hi] of list) {
          if (e.lsb <= hi && lo <= e.msb) {
            throw new ValidationError(`Rule 4 violation: edge "${e.id}" overlaps [${hi}:${lo}] in "${m.moduleName}".`);
          }
        }
        list.push([e.lsb, e.msb]);
        ranges.set(e.baseName, list);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 5: bidirectional is terminal
  // ---------------------------------------------------------------------------

  private static _validateDirections(s: StructuralModel): void {
    for (const m of s.modules) {
      for (const net of m.nets) {
        const dirs = new Set(net.endpoints.flatMap((ep) => (ep.kind === 'block' ? [] : [ep.direction])));
        const mustBeBidirectional = dirs.has('inout') || (dirs.has('in') && dirs.has('out'));
        if (mustBeBidirectional && net.direction !== 'bidirectional') {
          throw new ValidationError(
            `Rule 5 violation: net "${m.moduleName}.${net.name}" is "${net.direction}" but has ${[...dirs].sort().join('+')} endpoints.`,
          );
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 6: fragment ids unique per module
  // ---------------------------------------------------------------------------

  private static _validateFragments(b: BehavioralModel): void {
    for (const m of b.modules) {
      const seen = new Set<string>();
      const visit = (f: Fragment): void => {
        if (seen.has(f.id)) {
          throw new ValidationError(`Rule 6 violation: duplicate fragment id "${f.id}" in "${m.moduleName}".`);
        }
        seen.add(f.id);
        if (f.kind === 'conditional' || f.kind === 'case') f.branches.forEach((br) => br.fragments.forEach(visit));
        if (f.kind === 'loop') f.body.forEach(visit);
      };
      for (const block of m.blocks) block.fragments.forEach(visit);
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 7: levels and navigation
  // ---------------------------------------------------------------------------

  private static _validateGraph(g: GraphDescription): void {
    const levelIds = new Set<string>();
    for (const level of g.levels) {
      if (levelIds.has(level.id)) {
        throw new ValidationError(`Rule 7 violation: duplicate level id "${level.id}" (${level.path}).`);
      }
      levelIds.add(level.id);
    }

    const entryIds = new Set(g.index.entries.map((e) => e.id));
    for (const e of g.index.entries) {
      for (const child of e.children) {
        if (!entryIds.has(child)) {
          throw new ValidationError(`Rule 7 violation: "${e.path}" lists unknown child "${child}".`);
        }
      }
      if (e.file !== null && !levelIds.has(e.id)) {
        throw new ValidationError(`Rule 7 violation: "${e.path}" points at a missing level file.`);
      }
    }
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
