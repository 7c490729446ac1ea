export { type Policy, randomPolicy, goUpPolicy, seekTargetPolicy } from './policies';
export { type RunEpisodeOptions, type EpisodeRecord, runEpisode } from './runEpisode';
