export { App } from './App.js';
export { ParentIndex } from './ParentIndex.js';
export {
  createParam,
  validateParam,
  boolBody,
  intBody,
  floatBody,
  stringBody,
  fileBody,
  structBody,
  unionBody,
  carg,
  joinedCarg,
  group,
  joinedGroup,
  type ParamOptions,
} from './ParamFactory.js';
export * from './guards.js';
export * from './traverse.js';
export * from './presence.js';
export { emptyDocs, createDocs, mergeDocs } from './docs.js';
export {
  appToJson,
  appToJsonValue,
  appFromJson,
  appFromJsonValue,
  paramToJson,
  type JsonValue,
  type JsonObject,
} from './serialize.js';
export {
  renderCommandLine,
  renderParam,
  rendersAsList,
  resolveValue,
  type ParamValue,
  type ParamValues,
  type Rendered,
} from './render.js';
