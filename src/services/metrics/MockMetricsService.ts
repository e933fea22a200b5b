import { IMetricsService } from "@core/interfaces";
import {
  EntityValue,
  HassEntityState,
  Result,
  StatusEntities,
  success,
  failure,
} from "@core/types";
import { MetricsError } from "@core/errors";

/**
 * Mock metrics service for development and tests
 *
 * Serves entity states from memory. Without arguments it is seeded with
 * plausible values for every entity the status screen reads.
 */
export class MockMetricsService implements IMetricsService {
  private readonly entities = new Map<string, HassEntityState>();

  constructor(seed: HassEntityState[] = MockMetricsService.defaultEntities()) {
    seed.forEach((entity) => this.setEntity(entity));
  }

  async getEntity(entityId: string, field: string): Promise<EntityValue> {
    const entity = this.entities.get(entityId);
    if (!entity) {
      return null;
    }
    if (field === "state") {
      return entity.state;
    }
    const value = entity.attributes[field];
    return typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
      ? value
      : null;
  }

  async fetchEntity(entityId: string): Promise<Result<HassEntityState>> {
    const entity = this.entities.get(entityId);
    if (!entity) {
      return failure(MetricsError.httpError(entityId, 404));
    }
    return success(entity);
  }

  setEntity(entity: HassEntityState): void {
    this.entities.set(entity.entity_id, entity);
  }

  /**
   * Shorthand for an entity with only a state
   */
  setState(entityId: string, state: string): void {
    this.setEntity({ entity_id: entityId, state, attributes: {} });
  }

  removeEntity(entityId: string): void {
    this.entities.delete(entityId);
  }

  static defaultEntities(): HassEntityState[] {
    const state = (entityId: string, value: string): HassEntityState => ({
      entity_id: entityId,
      state: value,
      attributes: {},
    });

    return [
      state(StatusEntities.memoryUsage, "41.2"),
      state(StatusEntities.processorUse, "7"),
      state(StatusEntities.diskUsage, "23.5"),
      state(StatusEntities.processorTemperature, "48.7"),
      state(StatusEntities.ipEthernet, "192.168.1.20"),
      state(StatusEntities.ipWireless, "192.168.1.21"),
      state(StatusEntities.pingStatus, "on"),
      state(StatusEntities.pingLatency, "12.4"),
      state(StatusEntities.wanDownload, "94.1"),
      state(StatusEntities.wanUpload, "38.6"),
      state(StatusEntities.lastBoot, new Date(Date.now() - 86400000).toISOString()),
    ];
  }
}
