export {
  createModuleInfo,
  listDirectoryFiles,
  templateDirName,
  type ModuleInfo,
  type ModuleInfoOptions,
} from "./module-info.js";
