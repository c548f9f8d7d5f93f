export {
    filterMessages,
    filterMessageStream,
    isFilterActive,
    matchesFilter,
    validateFilterConfig,
    type FilterOptions
} from './message-filter';
export {
    combineRun,
    dropBreaks,
    dropBreakStream,
    mergeConsecutive,
    mergeMessageStream,
    RunAccumulator
} from './message-merger';
export { runPipeline, type PipelineOptions, type PipelineReporter } from './pipeline';
