// src/builder/builder.ts
import type { SurveyBackend } from "@/backend/types";
import { SurveyError } from "@/backend/errors";
import type { ReservedSegmentPolicy, SurveyorConfig } from "@/config/schema";
import { createLogger, type Logger } from "@/log";
import { PathMap, ResponsePath } from "@/path";
import { describeValue, type ReadonlyResponses, Responses, type ResponseValue } from "@/responses";
import { SurveyDefinitionError } from "@/survey/errors";
import { findReservedSegmentCollisions } from "@/survey/traverse";
import type { Survey, SurveyDefinition } from "@/survey/types";
import { createFieldValidator, validateSurvey } from "@/validation/dispatch";
import type { FieldValidator } from "@/validation/types";

import { applyOverrides, type MergeResult } from "./merge";

export interface SurveyBuilderOptions {
  debug?: boolean;
  reservedSegments?: ReservedSegmentPolicy;
}

function toPath(path: string | ResponsePath): ResponsePath {
  return typeof path === "string" ? ResponsePath.fromDotted(path) : path;
}

/** The partial answers a surface holds, laid over the values merge already fixed */
function withSeed(seed: Responses, partial: ReadonlyResponses): Responses {
  const combined = seed.clone();
  combined.extend(partial);
  return combined;
}

/**
 * Registers suggestions and assumptions for one schema, then runs it through a backend.
 *
 * @example
 * const config = await new SurveyBuilder(serverConfigSurvey)
 *   .suggest("port", int(8080))
 *   .assume("host", text("localhost"))
 *   .run(backend);
 */
export class SurveyBuilder<T> {
  private suggestions = new PathMap<ResponseValue>();
  private assumptions = new PathMap<ResponseValue>();
  private reservedSegments: ReservedSegmentPolicy;
  private log: Logger;

  constructor(
    private readonly survey: Survey<T>,
    options: SurveyBuilderOptions = {},
  ) {
    this.reservedSegments = options.reservedSegments ?? "warn";
    this.log = createLogger("builder", { debug: options.debug });
  }

  /** Pre-fill the answer at `path`; the user may change it */
  suggest(path: string | ResponsePath, value: ResponseValue): this {
    this.suggestions.set(toPath(path), value);
    return this;
  }

  /** Fix the answer at `path`; the question is not asked */
  assume(path: string | ResponsePath, value: ResponseValue): this {
    this.assumptions.set(toPath(path), value);
    return this;
  }

  /** Suggest every field of an existing instance */
  suggestFrom(instance: T): this {
    for (const [path, value] of this.survey.toResponses(instance).entries()) {
      this.suggestions.set(path, value);
    }
    return this;
  }

  /** Assume every field of an existing instance */
  assumeFrom(instance: T): this {
    for (const [path, value] of this.survey.toResponses(instance).entries()) {
      this.assumptions.set(path, value);
    }
    return this;
  }

  /** Apply settings and overrides loaded from a config file */
  withConfig(config: SurveyorConfig): this {
    if (config.debug !== undefined) this.log = createLogger("builder", { debug: config.debug });
    if (config.reservedSegments) this.reservedSegments = config.reservedSegments;
    for (const [key, value] of Object.entries(config.suggestions ?? {})) this.suggest(key, value);
    for (const [key, value] of Object.entries(config.assumptions ?? {})) this.assume(key, value);
    return this;
  }

  /** A fresh tree from the schema with every override applied */
  build(): MergeResult {
    const result = applyOverrides(this.survey.definition(), {
      suggestions: this.suggestions,
      assumptions: this.assumptions,
    });
    for (const path of result.assumed) {
      const value = result.responses.get(path);
      if (value) this.log.debug(`Assumed ${path.display()} = ${describeValue(value)}`);
    }
    for (const path of result.suggested) this.log.debug(`Suggested ${path.display()}`);
    for (const path of result.unmatched) this.log.debug(`No question answers at ${path.display()}, override ignored`);
    return result;
  }

  /**
   * Merge, collect through `backend`, then reconstruct.
   * Rejects with SurveyError; anything else a backend throws is wrapped as a backend failure.
   */
  async run(backend: SurveyBackend): Promise<T> {
    // Before merge: an assumed OneOf no longer shows up as one in the merged tree
    this.checkReservedSegments(this.survey.definition());
    const { definition, responses: seed } = this.build();

    const fieldValidator = createFieldValidator(definition, this.survey.validateField);
    const validate: FieldValidator = (path, partial) => fieldValidator(path, withSeed(seed, partial));
    const compositeValidators = this.survey.validateAll ? [this.survey.validateAll] : [];

    let collected: Responses;
    try {
      collected = await backend.collect(definition, validate, (partial) =>
        validateSurvey({ definition, responses: withSeed(seed, partial), fieldValidator, compositeValidators }),
      );
    } catch (error) {
      if (error instanceof SurveyError) throw error;
      throw SurveyError.backend(error);
    }

    this.log.debug(`Collected ${collected.size} response(s)`);
    return this.survey.fromResponses(withSeed(seed, collected));
  }

  private checkReservedSegments(definition: SurveyDefinition): void {
    if (this.reservedSegments === "ignore") return;
    for (const collision of findReservedSegmentCollisions(definition)) {
      const message = `Variant "${collision.variant}" of ${collision.path.display() || "<root>"} declares a field stored at ${collision.collidesAt.display()}, which holds the selection`;
      if (this.reservedSegments === "error") {
        throw new SurveyDefinitionError("reserved_segment", collision.collidesAt, message);
      }
      this.log.warn(message);
    }
  }
}
