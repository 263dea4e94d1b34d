export { runBootstrapTeams, cleanTeamName, parseFixtureLine, mergeFixtureTeams, type BootstrapTeamsOptions, type BootstrapTeamsResult } from './bootstrap-teams.js';
export { runDirectoryCheck, type DirectoryCheckOptions, type DirectoryCheckResult } from './directory-check.js';
export { runEvaluate, type EvaluateOptions, type EvaluateResult } from './evaluate.js';
export { runInteractive, InteractiveSession, type InteractiveOptions, type InteractiveResult } from './interactive.js';
export { runMarketsMap, type MarketsMapOptions, type MarketMapRow } from './markets-map.js';
export { runParse, type ParseOptions } from './parse.js';
