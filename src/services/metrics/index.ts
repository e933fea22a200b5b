export { HomeAssistantService } from "./HomeAssistantService";
export { MockMetricsService } from "./MockMetricsService";
