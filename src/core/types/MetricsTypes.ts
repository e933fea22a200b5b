/**
 * Scalar value of a home automation entity or one of its attributes
 */
export type EntityValue = string | number | boolean | null;

/**
 * State object as returned by the Home Assistant REST API
 * (`GET /api/states/<entity_id>`)
 */
export type HassEntityState = {
  entity_id: string;
  state: string;
  attributes: Record<string, unknown>;
  last_changed?: string;
  last_updated?: string;
};

/**
 * Entity ids read by the status screen
 */
export const StatusEntities = {
  memoryUsage: "sensor.system_monitor_memory_usage",
  processorUse: "sensor.system_monitor_processor_use",
  diskUsage: "sensor.system_monitor_disk_usage",
  processorTemperature: "sensor.system_monitor_processor_temperature",
  ipEthernet: "sensor.system_monitor_ipv4_address_end0",
  ipWireless: "sensor.system_monitor_ipv4_address_wlan0",
  pingStatus: "binary_sensor.8_8_8_8",
  pingLatency: "sensor.8_8_8_8_round_trip_time_average",
  wanDownload: "sensor.wan_download_speed_mbps",
  wanUpload: "sensor.wan_upload_speed_mbps",
  lastBoot: "sensor.system_monitor_last_boot",
} as const;
