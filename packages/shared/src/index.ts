export type {
  MetricKind,
  MetricDescriptor,
  MetricDesc,
  ScrapeGroup,
  Labels,
  MetricSample,
  AdminRow,
} from "./types/metrics.js";
