import { describe, it, expect } from "vitest";

import {
  RegistryError,
  ConflictError,
  TemplateLookupError,
  ViewConfigurationError,
  ConfigError,
} from "../../src/lib/errors.js";

describe("Error Classes", () => {
  describe("RegistryError", () => {
    it("should create a basic error", () => {
      const error = new RegistryError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("RegistryError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
    });

    it("should have proper stack trace", () => {
      const error = new RegistryError("Test message", "TEST_CODE");
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new RegistryError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "RegistryError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ConflictError", () => {
    it("should carry the conflict context", () => {
      const error = new ConflictError("Conflicting templates", { templateName: "index" });
      expect(error.name).toBe("ConflictError");
      expect(error.code).toBe("CONFLICT_ERROR");
      expect(error.context).toEqual({ templateName: "index" });
      expect(error).toBeInstanceOf(RegistryError);
    });
  });

  describe("TemplateLookupError", () => {
    it("should record the template name in its context", () => {
      const error = new TemplateLookupError("not found", "index", { directory: "/tpl" });
      expect(error.name).toBe("TemplateLookupError");
      expect(error.code).toBe("TEMPLATE_LOOKUP_ERROR");
      expect(error.templateName).toBe("index");
      expect(error.context).toEqual({ directory: "/tpl", templateName: "index" });
    });
  });

  describe("other errors", () => {
    it.each([
      [new ViewConfigurationError("x"), "ViewConfigurationError", "VIEW_CONFIGURATION_ERROR"],
      [new ConfigError("x"), "ConfigError", "CONFIG_ERROR"],
    ])("%s has its name and code", (error, name, code) => {
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
      expect(error).toBeInstanceOf(RegistryError);
    });
  });
});
