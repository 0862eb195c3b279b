// src/survey/traverse.ts
// Depth-first walks over question trees, in declaration order

import { POSITIONAL_KEY, SELECTED_VARIANTS_KEY, SELECTED_VARIANT_KEY } from "@/constants";
import { PathMap, ResponsePath } from "@/path";
import { cloneValue, type ReadonlyResponses } from "@/responses";

import { question } from "./question";
import type { DefaultValue, Question, QuestionKind, SurveyDefinition, Variant } from "./types";

/**
 * Questions carrying a variant's data, relative to the variant's namespace:
 * AllOf children as-is, a single `0` question for a positional payload, nothing for unit variants.
 */
export function variantQuestions(v: Variant): Question[] {
  switch (v.kind.type) {
    case "none":
      return [];
    case "all_of":
      return v.kind.questions;
    default:
      return [question(POSITIONAL_KEY, v.name, v.kind)];
  }
}

/**
 * Where a question's own answer lands in the store. Structural groups have none.
 */
export function answerPath(q: Question, absolute: ResponsePath): ResponsePath | undefined {
  switch (q.kind.type) {
    case "none":
    case "all_of":
      return undefined;
    case "one_of":
      return absolute.child(SELECTED_VARIANT_KEY);
    case "any_of":
      return absolute.child(SELECTED_VARIANTS_KEY);
    default:
      return absolute;
  }
}

export interface VisitedQuestion {
  question: Question;
  /** Absolute path of the question */
  path: ResponsePath;
  /** Absolute path its answer is stored at, if it has one */
  answerPath?: ResponsePath;
  depth: number;
}

/** Resolves which variants of a OneOf/AnyOf at `path` the walk should enter */
export type SelectionResolver = (q: Question, path: ResponsePath) => readonly number[];

export const NO_SELECTION: SelectionResolver = () => [];

/**
 * Reads OneOf/AnyOf selections from a store. Missing or mistyped selections enter nothing.
 */
export function selectionsFrom(responses: ReadonlyResponses): SelectionResolver {
  return (q, path) => {
    const selected = answerPath(q, path);
    const value = selected ? responses.get(selected) : undefined;
    if (value?.type === "chosen_variant") return [value.index];
    if (value?.type === "chosen_variants") return value.indices;
    return [];
  };
}

/**
 * Visits every question reachable under the given selections, depth-first in declaration order.
 * AllOf children are visited before the next sibling; OneOf/AnyOf variants only when selected.
 */
export function walkQuestions(
  questions: readonly Question[],
  visit: (visited: VisitedQuestion) => void,
  select: SelectionResolver = NO_SELECTION,
  prefix: ResponsePath = ResponsePath.empty(),
  depth = 0,
): void {
  for (const q of questions) {
    const path = prefix.concat(q.path);
    visit({ question: q, path, answerPath: answerPath(q, path), depth });

    const kind = q.kind;
    if (kind.type === "all_of") {
      walkQuestions(kind.questions, visit, select, path, depth + 1);
    } else if (kind.type === "one_of" || kind.type === "any_of") {
      for (const index of select(q, path)) {
        const chosen = kind.variants[index];
        if (!chosen) continue;
        const base = kind.type === "one_of" ? path : path.child(String(index));
        walkQuestions(variantQuestions(chosen), visit, select, base, depth + 1);
      }
    }
  }
}

/**
 * The question answering at `target` under the given selections. Variants of one OneOf
 * share paths (every positional payload lives at `P.0`), so only the chosen ones are searched.
 */
export function findQuestion(
  questions: readonly Question[],
  target: ResponsePath,
  select: SelectionResolver,
): Question | undefined {
  let found: Question | undefined;
  walkQuestions(
    questions,
    ({ question: q, answerPath: at }) => {
      if (!found && at?.equals(target)) found = q;
    },
    select,
  );
  return found;
}

/** Selects every variant, reaching every question that could ever be answered */
export const ALL_VARIANTS: SelectionResolver = (q) =>
  q.kind.type === "one_of" || q.kind.type === "any_of" ? q.kind.variants.map((_, i) => i) : [];

/**
 * Maps each answer path in the tree, including every variant sub-tree, to the question answering it.
 */
export function indexQuestions(def: SurveyDefinition): PathMap<Question> {
  const index = new PathMap<Question>();
  walkQuestions(
    def.questions,
    ({ question: q, answerPath: target }) => {
      if (target) index.set(target, q);
    },
    ALL_VARIANTS,
  );
  return index;
}

function cloneDefault(value: DefaultValue): DefaultValue {
  return value.type === "none" ? value : { type: value.type, value: cloneValue(value.value) };
}

function cloneKind(kind: QuestionKind): QuestionKind {
  switch (kind.type) {
    case "all_of":
      return { type: "all_of", questions: kind.questions.map(cloneQuestion) };
    case "one_of":
      return { ...kind, variants: kind.variants.map(cloneVariant) };
    case "any_of":
      return { ...kind, variants: kind.variants.map(cloneVariant), defaults: [...kind.defaults] };
    case "list":
      return { ...kind, element: { ...kind.element } };
    default:
      return { ...kind };
  }
}

function cloneVariant(v: Variant): Variant {
  return { name: v.name, kind: cloneKind(v.kind) };
}

export function cloneQuestion(q: Question): Question {
  return { path: q.path, ask: q.ask, kind: cloneKind(q.kind), default: cloneDefault(q.default) };
}

/** Deep copy. Paths are immutable and shared */
export function cloneDefinition(def: SurveyDefinition): SurveyDefinition {
  return { ...def, questions: def.questions.map(cloneQuestion) };
}

export interface ReservedSegmentCollision {
  /** Absolute path of the OneOf/AnyOf whose reserved key is shadowed */
  path: ResponsePath;
  /** Store path both the selection and the colliding field would use */
  collidesAt: ResponsePath;
  variant: string;
}

/**
 * Finds variant fields whose store path equals the selection key of the enclosing OneOf/AnyOf.
 * A OneOf stores variant fields directly under its own path, so a field named
 * `selected_variant` overwrites the selection.
 */
export function findReservedSegmentCollisions(def: SurveyDefinition): ReservedSegmentCollision[] {
  const collisions: ReservedSegmentCollision[] = [];
  walkQuestions(
    def.questions,
    ({ question: q, path, answerPath: selectionPath }) => {
      if ((q.kind.type !== "one_of" && q.kind.type !== "any_of") || !selectionPath) return;
      q.kind.variants.forEach((v, i) => {
        const base = q.kind.type === "one_of" ? path : path.child(String(i));
        for (const field of variantQuestions(v)) {
          const fieldPath = base.concat(field.path);
          if (fieldPath.equals(selectionPath)) {
            collisions.push({ path, collidesAt: fieldPath, variant: v.name });
          }
        }
      });
    },
    ALL_VARIANTS,
  );
  return collisions;
}
