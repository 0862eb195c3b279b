// src/backend/test-backend.ts
// Scripted collection surface for exercising surveys without a user

import { PathMap, ResponsePath } from "@/path";
import { bool, chosenVariant, chosenVariants, float, int, Responses, type ResponseValue, text } from "@/responses";
import { isAssumed } from "@/survey/question";
import { selectedVariantPath, selectedVariantsPath } from "@/survey/reconstruct";
import { selectionsFrom, walkQuestions } from "@/survey/traverse";
import type { SurveyDefinition } from "@/survey/types";
import type { FieldValidator } from "@/validation/types";

import { SurveyError } from "./errors";
import type { SurveyBackend, SurveyValidator } from "./types";

export interface RejectedAnswer {
  path: ResponsePath;
  value: ResponseValue;
  message: string;
}

function toPath(path: string | ResponsePath): ResponsePath {
  return typeof path === "string" ? ResponsePath.fromDotted(path) : path;
}

/**
 * Answers questions from queued responses, like a user typing them in order.
 *
 * Each path takes a queue of attempts; a rejected attempt is recorded and the next one
 * is tried, the way an interactive surface re-prompts. A question with no scripted answer
 * accepts its suggestion, if it has one.
 *
 * @example
 * const backend = new TestBackend().withText("host", "localhost").withInt("port", 8080);
 */
export class TestBackend implements SurveyBackend {
  private attempts = new PathMap<ResponseValue[]>();
  private cancelPaths = new PathMap<true>();
  private cursors = new PathMap<number>();
  /** Attempts the validators turned down in the latest run, in the order they happened */
  readonly rejected: RejectedAnswer[] = [];
  /** Answer paths in the order the latest run asked them */
  readonly asked: ResponsePath[] = [];

  respond(path: string | ResponsePath, ...values: ResponseValue[]): this {
    const target = toPath(path);
    this.attempts.set(target, [...(this.attempts.get(target) ?? []), ...values]);
    return this;
  }

  withText(path: string | ResponsePath, ...values: string[]): this {
    return this.respond(path, ...values.map(text));
  }

  withInt(path: string | ResponsePath, ...values: number[]): this {
    return this.respond(path, ...values.map(int));
  }

  withFloat(path: string | ResponsePath, ...values: number[]): this {
    return this.respond(path, ...values.map(float));
  }

  withBool(path: string | ResponsePath, value: boolean): this {
    return this.respond(path, bool(value));
  }

  /** Choose a variant of the OneOf at `path` (the question's path, not its selection key) */
  withVariant(path: string | ResponsePath, index: number): this {
    return this.respond(selectedVariantPath(toPath(path)), chosenVariant(index));
  }

  withVariants(path: string | ResponsePath, indices: number[]): this {
    return this.respond(selectedVariantsPath(toPath(path)), chosenVariants(indices));
  }

  /** Abort the run when the question answering at `path` comes up */
  cancelAt(path: string | ResponsePath): this {
    this.cancelPaths.set(toPath(path), true);
    return this;
  }

  async collect(definition: SurveyDefinition, validate: FieldValidator, validateAll?: SurveyValidator): Promise<Responses> {
    const responses = new Responses();
    this.cursors.clear();
    this.asked.length = 0;
    this.rejected.length = 0;

    walkQuestions(
      definition.questions,
      ({ question, answerPath }) => {
        if (!answerPath || isAssumed(question)) return;
        this.asked.push(answerPath);
        if (this.cancelPaths.has(answerPath)) {
          throw SurveyError.cancelled(`Survey cancelled at ${answerPath.display()}`);
        }
        const fallback = question.default.type === "suggested" ? question.default.value : undefined;
        this.answer(answerPath, responses, validate, fallback);
      },
      selectionsFrom(responses),
    );

    if (validateAll) {
      for (let errors = validateAll(responses); errors.size > 0; errors = validateAll(responses)) {
        for (const [path, message] of errors) {
          const current = responses.get(path);
          if (current) this.rejected.push({ path, value: current, message });
          this.answer(path, responses, validate, undefined, message);
        }
      }
    }

    return responses;
  }

  private next(path: ResponsePath): ResponseValue | undefined {
    const queue = this.attempts.get(path) ?? [];
    const cursor = this.cursors.get(path) ?? 0;
    this.cursors.set(path, cursor + 1);
    return queue[cursor];
  }

  private answer(
    path: ResponsePath,
    responses: Responses,
    validate: FieldValidator,
    fallback: ResponseValue | undefined,
    lastMessage?: string,
  ): void {
    let reason = lastMessage;
    for (let value = this.next(path) ?? fallback; value; value = this.next(path)) {
      const candidate = responses.clone();
      candidate.insert(path, value);
      const result = validate(path, candidate);
      if (result.valid) {
        responses.insert(path, value);
        return;
      }
      reason = result.message;
      this.rejected.push({ path, value, message: result.message });
    }
    const detail = reason ? `no valid response for ${path.display()} (last error: ${reason})` : `no response for ${path.display()}`;
    throw new SurveyError("backend", `Test backend has ${detail}`);
  }
}
