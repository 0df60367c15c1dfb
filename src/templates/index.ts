/**
 * Template handles and the factories that build them from files
 *
 * @example
 * ```typescript
 * import { createFactoryMap } from "@/templates";
 *
 * const factories = createFactoryMap(["pt", "html"]);
 * const factory = factories.factoryFor("pt");
 * ```
 */

export { FileTemplate, InlineTemplate, type Template } from "./template.js";
export {
  TemplateFactoryMap,
  createFactoryMap,
  fileTemplateFactory,
  type TemplateFactory,
} from "./factories.js";
