export {
    ColumnMapper,
    confidenceFor,
    headerWords,
    normalizeHeader,
    scoreHeader,
    type ColumnMapperOptions,
} from "./ColumnMapper.js";
