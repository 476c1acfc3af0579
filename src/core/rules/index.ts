export { createRuleSet, compareRules, ruleKey, toRuleInputs } from './ruleset.js';
export type { RuleInput } from './ruleset.js';
export { loadRuleSet, parseRuleFile, bundledRulesPath, ruleSetHash, ruleFileSchema } from './loader.js';
export type { BundledRules, RuleFile } from './loader.js';
