export { checkTemplates, templateNameFor, type ViewDeclaration } from "./check-templates.js";
