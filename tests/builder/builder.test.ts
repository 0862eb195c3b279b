// tests/builder/builder.test.ts
import { afterEach, describe, expect, it, vi } from "vitest";

import { SurveyError, type SurveyBackend, TestBackend } from "../../src/backend";
import { SurveyBuilder } from "../../src/builder";
import { ResponsePath } from "../../src/path";
import { chosenVariant, int, Responses, text } from "../../src/responses";
import {
  allOf,
  definition,
  input,
  int as intKind,
  oneOf,
  question,
  selectedVariant,
  type Survey,
  SurveyDefinitionError,
  unitVariant,
  variant,
} from "../../src/survey";
import { type AppSettings, appSettingsSurvey, serverSurvey, signupSurvey } from "../fixtures/surveys";

const p = ResponsePath.fromDotted;

const settings: AppSettings = {
  name: "production",
  server: { host: "example.com", port: 443 },
  payment: { kind: "card", number: "4000-0000", cvv: 321 },
  features: [{ kind: "dark_mode" }, { kind: "notifications", email: true, push: false }],
  tags: ["live"],
  ratio: 1,
};

// A OneOf whose second variant declares a field that lands on the selection key
const shadowedSurvey: Survey<number> = {
  definition: () =>
    definition([
      question(
        "method",
        "Method?",
        oneOf([unitVariant("None"), variant("Custom", allOf([question("selected_variant", "Which?", input())]))]),
      ),
    ]),
  fromResponses: (responses) => selectedVariant(responses, p("method")),
  toResponses: (value) => Responses.from([[p("method.selected_variant"), chosenVariant(value)]]),
};

type Limit = { kind: "count"; count: number } | { kind: "label"; label: string };

// Both variants keep their payload at limit.0
const limitSurvey: Survey<Limit> = {
  definition: () =>
    definition([question("limit", "Limit by?", oneOf([variant("Count", intKind({ min: 1 })), variant("Label", input())]))]),
  fromResponses: (responses) =>
    selectedVariant(responses, p("limit")) === 0
      ? { kind: "count", count: responses.getInt(p("limit.0")) }
      : { kind: "label", label: responses.getText(p("limit.0")) },
  toResponses: (value) =>
    Responses.from([
      [p("limit.selected_variant"), chosenVariant(value.kind === "count" ? 0 : 1)],
      [p("limit.0"), value.kind === "count" ? int(value.count) : text(value.label)],
    ]),
};

const pickFirst: SurveyBackend = {
  collect: async () => Responses.from([[p("method.selected_variant"), chosenVariant(0)]]),
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("SurveyBuilder", () => {
  describe("run", () => {
    it("should collect and reconstruct a value", async () => {
      const backend = new TestBackend().withText("host", "localhost").withInt("port", 8080);

      const config = await new SurveyBuilder(serverSurvey).run(backend);

      expect(config).toEqual({ host: "localhost", port: 8080 });
    });

    it("should not ask assumed questions but still return their values", async () => {
      const backend = new TestBackend().withText("host", "localhost");

      const config = await new SurveyBuilder(serverSurvey).assume("port", int(8080)).run(backend);

      expect(config).toEqual({ host: "localhost", port: 8080 });
      expect(backend.asked.map(String)).toEqual(["host"]);
    });

    it("should offer suggestions as defaults", async () => {
      const backend = new TestBackend().withText("host", "localhost");

      const config = await new SurveyBuilder(serverSurvey).suggest("port", int(3000)).run(backend);

      expect(config.port).toBe(3000);
      expect(backend.asked.map(String)).toEqual(["host", "port"]);
    });

    it("should return an instance unchanged when every field is assumed", async () => {
      const backend = new TestBackend();

      const restored = await new SurveyBuilder(appSettingsSurvey).assumeFrom(settings).run(backend);

      expect(restored).toEqual(settings);
      expect(backend.asked).toEqual([]);
    });

    it("should prefill every field from an instance", async () => {
      // Overrides stop at OneOf/AnyOf questions, so variant data is answered again
      const backend = new TestBackend()
        .withText("name", "renamed")
        .withText("payment.number", "4000-0000")
        .withInt("payment.cvv", 321)
        .withBool("features.1.email", true)
        .withBool("features.1.push", false);

      const edited = await new SurveyBuilder(appSettingsSurvey).suggestFrom(settings).run(backend);

      expect(edited).toEqual({ ...settings, name: "renamed" });
    });

    it("should collect the data of the chosen variants", async () => {
      const backend = new TestBackend()
        .withVariant("payment", 0)
        .withVariants("features", [0, 1])
        .withBool("features.1.email", true)
        .withBool("features.1.push", false);

      const restored = await new SurveyBuilder(appSettingsSurvey)
        .assume("name", text("n"))
        .assume("server.host", text("h"))
        .assume("server.port", int(1))
        .assume("ratio", { type: "float", value: 0.5 })
        .assume("tags", { type: "text_list", values: [] })
        .run(backend);

      expect(restored.payment).toEqual({ kind: "cash" });
      expect(restored.features).toEqual([{ kind: "dark_mode" }, { kind: "notifications", email: true, push: false }]);
    });

    it("should validate payloads of variants that share a path by the chosen kind", async () => {
      const counted = await new SurveyBuilder(limitSurvey).run(new TestBackend().withVariant("limit", 0).withInt("limit.0", 5));
      const labelled = await new SurveyBuilder(limitSurvey).run(
        new TestBackend().withVariant("limit", 1).withText("limit.0", "recent"),
      );

      expect(counted).toEqual({ kind: "count", count: 5 });
      expect(labelled).toEqual({ kind: "label", label: "recent" });
    });

    it("should re-prompt until field and composite validators pass", async () => {
      const backend = new TestBackend()
        .withText("username", "alice")
        .withText("password", "short", "long enough")
        .withText("confirm_password", "different", "long enough");

      const signup = await new SurveyBuilder(signupSurvey).run(backend);

      expect(signup).toEqual({ username: "alice", password: "long enough", confirmPassword: "long enough" });
      expect(backend.rejected.map((r) => `${r.path.display()}: ${r.message}`)).toEqual([
        "password: too short",
        "confirm_password: must match sibling",
      ]);
    });

    it("should let validators see assumed values", async () => {
      const backend = new TestBackend().withText("username", "alice").withText("confirm_password", "other", "long enough");

      const signup = await new SurveyBuilder(signupSurvey).assume("password", text("long enough")).run(backend);

      expect(signup.confirmPassword).toBe("long enough");
      expect(backend.rejected).toHaveLength(1);
    });

    it("should propagate cancellation", async () => {
      const backend = new TestBackend().cancelAt("host");

      await expect(new SurveyBuilder(serverSurvey).run(backend)).rejects.toMatchObject({
        type: "cancelled",
        message: "Survey cancelled at host",
      });
    });

    it("should wrap other backend failures", async () => {
      const cause = new Error("terminal closed");
      const broken: SurveyBackend = {
        collect: async () => {
          throw cause;
        },
      };

      const result = new SurveyBuilder(serverSurvey).run(broken);

      await expect(result).rejects.toBeInstanceOf(SurveyError);
      await expect(result).rejects.toMatchObject({ type: "backend", message: "Backend error: terminal closed", cause });
    });
  });

  describe("reserved segments", () => {
    it("should warn by default", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      await expect(new SurveyBuilder(shadowedSurvey).run(pickFirst)).resolves.toBe(0);
      expect(warn).toHaveBeenCalledWith(
        '[surveyor:builder] Variant "Custom" of method declares a field stored at method.selected_variant, which holds the selection',
      );
    });

    it("should fail under the error policy", async () => {
      const result = new SurveyBuilder(shadowedSurvey, { reservedSegments: "error" }).run(pickFirst);

      await expect(result).rejects.toBeInstanceOf(SurveyDefinitionError);
      await expect(result).rejects.toMatchObject({ type: "reserved_segment" });
    });

    it("should report a collision even when the choice is assumed", async () => {
      const backend = new TestBackend().withText("method.selected_variant", "custom");

      const result = new SurveyBuilder(shadowedSurvey, { reservedSegments: "error" })
        .assume("method.selected_variant", chosenVariant(1))
        .run(backend);

      await expect(result).rejects.toBeInstanceOf(SurveyDefinitionError);
      await expect(result).rejects.toMatchObject({ type: "reserved_segment" });
      expect(backend.asked).toEqual([]);
    });

    it("should stay silent under the ignore policy", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      await new SurveyBuilder(shadowedSurvey, { reservedSegments: "ignore" }).run(pickFirst);

      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe("withConfig", () => {
    it("should apply suggestions, assumptions and settings from a config", async () => {
      const backend = new TestBackend();
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      const config = await new SurveyBuilder(serverSurvey)
        .withConfig({
          debug: true,
          suggestions: { host: { type: "text", value: "config.example" } },
          assumptions: { port: { type: "int", value: 2222 } },
        })
        .run(backend);

      expect(config).toEqual({ host: "config.example", port: 2222 });
      expect(log).toHaveBeenCalledWith("[surveyor:builder] Assumed port = 2222");
      expect(log).toHaveBeenCalledWith("[surveyor:builder] Suggested host");
    });

    it("should take the reserved segment policy from the config", async () => {
      const result = new SurveyBuilder(shadowedSurvey).withConfig({ reservedSegments: "error" }).run(pickFirst);
      await expect(result).rejects.toBeInstanceOf(SurveyDefinitionError);
    });
  });

  describe("build", () => {
    it("should log overrides nothing answers when debugging", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      const result = new SurveyBuilder(serverSurvey, { debug: true }).suggest("hostname", text("x")).build();

      expect(result.unmatched.map(String)).toEqual(["hostname"]);
      expect(log).toHaveBeenCalledWith("[surveyor:builder] No question answers at hostname, override ignored");
    });

    it("should log nothing without debug", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      new SurveyBuilder(serverSurvey).assume("port", int(1)).build();

      expect(log).not.toHaveBeenCalled();
    });
  });
});
