import { symlinkSync } from "fs";
import { join } from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { TemplateRegistry, createTemplateRegistry } from "@/core/registry/template-registry.js";
import { ConflictError, TemplateLookupError } from "@/lib/errors.js";
import { createModuleInfo } from "@/modules/module-info.js";
import { FileTemplate, InlineTemplate } from "@/templates/template.js";
import { createFactoryMap } from "@/templates/factories.js";
import { createFakeModule, createTempTree, createTestRegistry } from "@tests/fixtures/modules.js";

const DIR = "/project/shop/views/cart_templates";

describe("TemplateRegistry", () => {
  let registry: TemplateRegistry;
  let warnings: string[];
  const cart = createFakeModule({ directories: { cart_templates: ["index.pt", "edit.pt"] } });
  const checkout = createFakeModule({ dottedName: "shop.views.checkout" });

  beforeEach(() => {
    ({ registry, warnings } = createTestRegistry());
  });

  describe("lookup", () => {
    it("prefers the file template", () => {
      registry.registerDirectory(cart);
      registry.registerInlineTemplate(cart, "club", new InlineTemplate("<p>club</p>"));

      const template = registry.lookup(cart, "index");

      expect(template).toBeInstanceOf(FileTemplate);
    });

    it("falls back to the inline template", () => {
      const template = new InlineTemplate("<p>club</p>");
      registry.registerDirectory(cart);
      registry.registerInlineTemplate(cart, "club", template);

      expect(registry.lookup(cart, "club")).toBe(template);
    });

    it("falls back to the inline template when the module has no template directory", () => {
      const template = new InlineTemplate("<p>pay</p>");
      registry.registerDirectory(checkout);
      registry.registerInlineTemplate(checkout, "pay", template);

      expect(registry.lookup(checkout, "pay")).toBe(template);
    });

    it("rethrows the file registry's error when neither side has the name", () => {
      registry.registerDirectory(cart);

      expect(() => registry.lookup(cart, "missing")).toThrow(TemplateLookupError);
      expect(() => registry.lookup(cart, "missing")).toThrow(`template 'missing' in '${DIR}' cannot be found`);
    });

    it("leaves entries unassociated by default", () => {
      registry.registerDirectory(cart);

      registry.lookup(cart, "index");

      expect(registry.unassociatedFileTemplates()).toEqual([`${DIR}/index.pt`, `${DIR}/edit.pt`]);
    });

    it("marks the file entry it returns as associated", () => {
      registry.registerDirectory(cart);

      registry.lookup(cart, "index", true);

      expect(registry.unassociatedFileTemplates()).toEqual([`${DIR}/edit.pt`]);
    });

    it("marks the inline entry it returns as associated", () => {
      registry.registerInlineTemplate(cart, "club", new InlineTemplate("<p>club</p>"));
      registry.registerInlineTemplate(cart, "lounge", new InlineTemplate("<p>lounge</p>"));

      registry.lookup(cart, "club", true);

      expect(registry.unassociatedInlineTemplates()).toEqual([{ module: "shop.views.cart", name: "lounge" }]);
    });

    it("lets views in different modules share a file template", () => {
      const shared = createFakeModule({
        dottedName: "shop.views.shared",
        directories: { templates: ["layout.pt"] },
      });
      const other = createFakeModule({
        dottedName: "shop.views.other",
        directories: { templates: ["layout.pt"] },
      });
      registry.registerDirectory(shared, "templates");
      registry.registerDirectory(other, "templates");

      registry.lookup(shared, "layout", true);
      registry.lookup(other, "layout", true);

      expect(registry.files.size).toBe(1);
      expect(registry.unassociatedFileTemplates()).toEqual([]);
    });
  });

  describe("has", () => {
    it("checks both registries without associating", () => {
      registry.registerDirectory(cart);
      registry.registerInlineTemplate(cart, "club", new InlineTemplate("<p>club</p>"));

      expect(registry.has(cart, "index")).toBe(true);
      expect(registry.has(cart, "club")).toBe(true);
      expect(registry.has(cart, "missing")).toBe(false);
      expect(registry.unassociatedFileTemplates()).toHaveLength(2);
    });
  });

  describe("registration order", () => {
    it("rejects a conflict whichever side registers first", () => {
      const inlineFirst = createTestRegistry().registry;
      inlineFirst.registerInlineTemplate(cart, "edit", new InlineTemplate("<p>edit</p>"));
      expect(() => inlineFirst.registerDirectory(cart)).toThrow(ConflictError);

      registry.registerDirectory(cart);
      expect(() => registry.registerInlineTemplate(cart, "edit", new InlineTemplate("<p>edit</p>"))).toThrow(
        ConflictError
      );
    });
  });

  describe("checkUnassociated", () => {
    it("warns per module and per directory", () => {
      registry.registerDirectory(cart);
      registry.registerInlineTemplate(cart, "club", new InlineTemplate("<p>club</p>"));
      registry.registerInlineTemplate(cart, "lounge", new InlineTemplate("<p>lounge</p>"));
      registry.lookup(cart, "index", true);

      const report = registry.checkUnassociated();

      expect(report).toEqual({
        inline: [
          { module: "shop.views.cart", name: "club" },
          { module: "shop.views.cart", name: "lounge" },
        ],
        files: [`${DIR}/edit.pt`],
      });
      expect(warnings).toEqual([
        "Found the following unassociated template(s) when registering 'shop.views.cart': club, lounge. " +
          "Define views that use the template(s) to enable them.",
        `Found the following unassociated template(s) in directory '${DIR}': edit.pt. ` +
          "Define views that use the template(s) to enable them.",
      ]);
    });

    it("stays quiet when every template is associated", () => {
      registry.registerDirectory(createFakeModule({ directories: { cart_templates: ["index.pt"] } }));
      registry.lookup(cart, "index", true);

      expect(registry.checkUnassociated()).toEqual({ inline: [], files: [] });
      expect(warnings).toEqual([]);
    });
  });

  describe("clearAll", () => {
    it("wipes both registries", () => {
      registry.registerDirectory(cart);
      registry.registerInlineTemplate(cart, "club", new InlineTemplate("<p>club</p>"));

      registry.clearAll();

      expect(registry.files.size).toBe(0);
      expect(registry.inline.size).toBe(0);
      expect(() => registry.lookup(cart, "club")).toThrow(TemplateLookupError);
    });

    it("keeps conflict checks working afterwards", () => {
      registry.registerDirectory(cart);
      registry.clearAll();

      registry.registerInlineTemplate(cart, "index", new InlineTemplate("<p>index</p>"));

      expect(() => registry.registerDirectory(cart)).toThrow(ConflictError);
    });
  });

  describe("default warning sink", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("logs warnings through the logger", () => {
      const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const quiet = createTemplateRegistry({ factories: createFactoryMap(["pt"]) });

      quiet.registerDirectory(createFakeModule({ directories: { cart_templates: ["notes.txt"] } }));

      expect(spy).toHaveBeenCalledTimes(1);
      expect(String(spy.mock.calls[0]?.[0])).toContain(
        `[templates] File 'notes.txt' has an unrecognized extension in directory '${DIR}'`
      );
    });
  });

  describe("with templates on disk", () => {
    let root: string;
    let cleanup: () => void;

    beforeEach(() => {
      ({ root, cleanup } = createTempTree({
        "cart_templates/index.pt": "<p>index</p>",
        "cart_templates/receipt.html": "<p>receipt</p>",
        "cart_templates/index.pt~": "<p>backup</p>",
      }));
    });

    afterEach(() => {
      cleanup();
    });

    it("registers and resolves the files of a module directory", () => {
      const module = createModuleInfo({ dottedName: "shop.cart", directory: root });

      registry.registerDirectory(module);

      expect(registry.unassociatedFileTemplates()).toEqual([
        join(root, "cart_templates", "index.pt"),
        join(root, "cart_templates", "receipt.html"),
      ]);
      expect(registry.lookup(module, "receipt")).toBeInstanceOf(FileTemplate);
      expect(warnings).toEqual([]);
    });

    it("registers templates that are symbolic links", () => {
      const module = createModuleInfo({ dottedName: "shop.cart", directory: root });
      symlinkSync(join(root, "cart_templates", "index.pt"), join(root, "cart_templates", "edit.pt"));

      registry.registerDirectory(module);

      expect(registry.lookup(module, "edit")).toBeInstanceOf(FileTemplate);
      expect(registry.files.size).toBe(3);
    });
  });
});
