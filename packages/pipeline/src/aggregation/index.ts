export {
    Aggregator,
    bucketFor,
    type AggregatorConfig,
    type BucketCount,
    type ResolvedDimension,
} from "./Aggregator.js";
