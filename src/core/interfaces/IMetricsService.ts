import { EntityValue, HassEntityState, Result } from "@core/types";

/**
 * Metrics Service Interface
 *
 * Looks up values of home automation entities. Failures are handled inside
 * the service: getEntity() resolves to null when a value cannot be
 * provided.
 */
export interface IMetricsService {
  /**
   * Read one field of an entity
   * @param entityId Namespaced id, e.g. 'sensor.system_monitor_disk_usage'
   * @param field 'state' for the entity state, otherwise an attribute name
   */
  getEntity(entityId: string, field: string): Promise<EntityValue>;

  /**
   * Fetch the full state object of an entity
   */
  fetchEntity(entityId: string): Promise<Result<HassEntityState>>;
}
