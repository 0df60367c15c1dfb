import { ViewConfigurationError } from "../lib/errors.js";

import type { TemplateRegistry } from "../core/registry/template-registry.js";
import type { ModuleInfo } from "../modules/module-info.js";
import type { Template } from "../templates/template.js";

/**
 * A view as declared by application code
 */
export interface ViewDeclaration {
  /** View class name; lower-cased it is the default template name */
  name: string;
  /** Explicit template name */
  template?: string | undefined;
  /** The view renders itself */
  hasRender: boolean;
  /** The view cannot render without a template (defaults to `!hasRender`) */
  needsTemplate?: boolean | undefined;
}

/**
 * Template name a view resolves to
 */
export function templateNameFor(view: ViewDeclaration): string {
  return view.template ?? view.name.toLowerCase();
}

/**
 * Resolve the template of a view and claim it
 *
 * @param kind - word used for the view in error messages
 * @returns the associated template, or undefined when the view renders itself
 * @throws ViewConfigurationError when the view has two ways (or none) to render
 */
export function checkTemplates(
  registry: TemplateRegistry,
  moduleInfo: ModuleInfo,
  view: ViewDeclaration,
  kind = "view"
): Template | undefined {
  const defaultName = view.name.toLowerCase();
  const templateName = templateNameFor(view);
  const context = { view: view.name, module: moduleInfo.dottedName, templateName };

  if (templateName !== defaultName && registry.has(moduleInfo, defaultName)) {
    throw new ViewConfigurationError(
      `Multiple possible templates for ${kind} '${view.name}'. It uses template '${templateName}', ` +
        `but there is also a template called '${defaultName}'.`,
      context
    );
  }

  if (!registry.has(moduleInfo, templateName)) {
    if (view.needsTemplate ?? !view.hasRender) {
      throw new ViewConfigurationError(
        `${capitalize(kind)} '${view.name}' has no associated template or 'render' method.`,
        context
      );
    }
    return undefined;
  }

  const template = registry.lookup(moduleInfo, templateName, true);
  if (view.hasRender) {
    throw new ViewConfigurationError(
      `Multiple possible ways to render ${kind} '${view.name}'. ` +
        "It has both a 'render' method as well as an associated template.",
      context
    );
  }
  return template;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
