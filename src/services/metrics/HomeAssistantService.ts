import { z } from "zod";
import { IMetricsService } from "@core/interfaces";
import {
  EntityValue,
  HassEntityState,
  HomeAssistantConfig,
  Result,
  success,
  failure,
} from "@core/types";
import { MetricsError } from "@core/errors";
import { getLogger } from "@utils/logger";

const logger = getLogger("HomeAssistant");

/**
 * Body of `GET /api/states/<entity_id>`
 */
const entityStateSchema = z.object({
  entity_id: z.string(),
  state: z.string(),
  attributes: z.record(z.unknown()),
  last_changed: z.string().optional(),
  last_updated: z.string().optional(),
});

/**
 * Home Assistant metrics service
 *
 * Reads entity states over the Home Assistant REST API, authenticated with
 * a long-lived access token.
 */
export class HomeAssistantService implements IMetricsService {
  private readonly baseUrl: string;

  constructor(private readonly config: HomeAssistantConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  /**
   * Read the state (`field` = 'state') or an attribute of an entity.
   * Resolves to null when the entity cannot be read or the attribute is
   * missing or not a scalar.
   */
  async getEntity(entityId: string, field: string): Promise<EntityValue> {
    const result = await this.fetchEntity(entityId);
    if (!result.success) {
      logger.warn(`${entityId}: ${result.error.message}`);
      return null;
    }

    if (field === "state") {
      return result.data.state;
    }

    const value = result.data.attributes[field];
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      return value;
    }
    if (value !== undefined && value !== null) {
      logger.warn(`${entityId}: attribute '${field}' is not a scalar`);
    }
    return null;
  }

  async fetchEntity(entityId: string): Promise<Result<HassEntityState>> {
    if (!this.baseUrl) {
      return failure(MetricsError.notConfigured());
    }

    const url = `${this.baseUrl}/api/states/${encodeURIComponent(entityId)}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          "Content-Type": "application/json",
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        return failure(MetricsError.httpError(entityId, response.status));
      }

      const parsed = entityStateSchema.safeParse(await response.json());
      if (!parsed.success) {
        return failure(
          MetricsError.invalidResponse(
            entityId,
            parsed.error.issues
              .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
              .join("; "),
          ),
        );
      }

      logger.debug(`${entityId} = ${parsed.data.state}`);
      return success(parsed.data);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return failure(MetricsError.timeout(entityId, this.config.timeoutMs));
      }
      if (error instanceof SyntaxError) {
        return failure(MetricsError.invalidResponse(entityId, error.message));
      }
      return failure(
        MetricsError.requestFailed(
          entityId,
          error instanceof Error ? error : new Error(String(error)),
        ),
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
