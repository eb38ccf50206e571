export {
    formatMapping,
    formatParseError,
    formatReport,
    formatSnapshot,
    type ReportOptions,
} from "./formatReport.js";
