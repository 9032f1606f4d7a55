export { discoverModuleFiles } from "./module-discovery.js";
export { loadModules } from "./module-loader.js";
