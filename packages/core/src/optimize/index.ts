export { OptimizerPass, type PassMetadata, type PassContext, type PassResult } from './OptimizerPass.js';
export { MergeStringTokensPass } from './MergeStringTokensPass.js';
export { FoldConstantOptionalStructsPass } from './FoldConstantOptionalStructsPass.js';
export { FlattenSingleParamStructsPass } from './FlattenSingleParamStructsPass.js';
export { TruthyChoicesPass, TRUTHY, FALSY, truthyPair } from './TruthyChoicesPass.js';
export { Optimizer, optimize, defaultPasses, type OptimizeOptions, type PassReport } from './Optimizer.js';
export { locateToken, type TokenLocation } from './locate.js';
