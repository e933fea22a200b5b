import { HomeAssistantService } from "../HomeAssistantService";
import { MetricsError, MetricsErrorCode } from "@core/errors";
import { HomeAssistantConfig } from "@core/types";

// Mock the fetch API
const mockFetch = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
global.fetch = mockFetch;

// Mock the logger
jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const jsonResponse = (body: unknown, status: number = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

describe("HomeAssistantService", () => {
  const config: HomeAssistantConfig = {
    baseUrl: "http://hass.local:8123/",
    token: "test-secret",
    timeoutMs: 1000,
  };

  const diskEntity = {
    entity_id: "sensor.system_monitor_disk_usage",
    state: "23.5",
    attributes: {
      unit_of_measurement: "%",
      friendly_name: "Disk usage",
      precision: 1,
    },
    last_changed: "2025-10-17T18:19:13.000000+00:00",
  };

  let service: HomeAssistantService;

  beforeEach(() => {
    mockFetch.mockReset();
    service = new HomeAssistantService(config);
  });

  describe("fetchEntity", () => {
    it("should request the entity with the bearer token", async () => {
      mockFetch.mockResolvedValue(jsonResponse(diskEntity));

      const result = await service.fetchEntity(diskEntity.entity_id);

      expect(result.success).toBe(true);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(
        "http://hass.local:8123/api/states/sensor.system_monitor_disk_usage",
      );
      expect(init?.headers).toEqual({
        Authorization: "Bearer test-secret",
        "Content-Type": "application/json",
      });
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it("should return the validated state object", async () => {
      mockFetch.mockResolvedValue(jsonResponse(diskEntity));

      const result = await service.fetchEntity(diskEntity.entity_id);

      expect(result).toEqual({ success: true, data: diskEntity });
    });

    it("should fail with the HTTP status", async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ message: "Entity not found." }, 404),
      );

      const result = await service.fetchEntity("sensor.missing");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(MetricsError);
        expect(result.error.message).toBe(
          "Request for sensor.missing returned HTTP 404",
        );
      }
    });

    it("should reject a body without a state", async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ entity_id: "sensor.x", attributes: {} }),
      );

      const result = await service.fetchEntity("sensor.x");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: MetricsErrorCode.INVALID_RESPONSE,
        });
      }
    });

    it("should reject a body that is not JSON", async () => {
      mockFetch.mockResolvedValue(new Response("<html>", { status: 200 }));

      const result = await service.fetchEntity("sensor.x");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: MetricsErrorCode.INVALID_RESPONSE,
        });
      }
    });

    it("should report network failures", async () => {
      mockFetch.mockRejectedValue(new TypeError("fetch failed"));

      const result = await service.fetchEntity("sensor.x");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: MetricsErrorCode.REQUEST_FAILED,
        });
        expect(result.error.message).toBe(
          "Request for sensor.x failed: fetch failed",
        );
      }
    });

    it("should abort after the timeout", async () => {
      mockFetch.mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              const error = new Error("This operation was aborted");
              error.name = "AbortError";
              reject(error);
            });
          }),
      );
      const fast = new HomeAssistantService({ ...config, timeoutMs: 10 });

      const result = await fast.fetchEntity("sensor.slow");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: MetricsErrorCode.TIMEOUT,
        });
        expect(result.error.message).toBe(
          "Request for sensor.slow timed out after 10ms",
        );
      }
    });

    it("should not make a request without a base URL", async () => {
      const unconfigured = new HomeAssistantService({ ...config, baseUrl: "" });

      const result = await unconfigured.fetchEntity("sensor.x");

      expect(mockFetch).not.toHaveBeenCalled();
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: MetricsErrorCode.NOT_CONFIGURED,
        });
      }
    });
  });

  describe("getEntity", () => {
    it("should return the state for the state field", async () => {
      mockFetch.mockResolvedValue(jsonResponse(diskEntity));

      await expect(
        service.getEntity(diskEntity.entity_id, "state"),
      ).resolves.toBe("23.5");
    });

    it("should return an attribute for any other field", async () => {
      mockFetch.mockResolvedValue(jsonResponse(diskEntity));

      await expect(
        service.getEntity(diskEntity.entity_id, "unit_of_measurement"),
      ).resolves.toBe("%");
    });

    it("should keep numeric attributes as numbers", async () => {
      mockFetch.mockResolvedValue(jsonResponse(diskEntity));

      await expect(
        service.getEntity(diskEntity.entity_id, "precision"),
      ).resolves.toBe(1);
    });

    it("should return null for a missing attribute", async () => {
      mockFetch.mockResolvedValue(jsonResponse(diskEntity));

      await expect(
        service.getEntity(diskEntity.entity_id, "icon"),
      ).resolves.toBeNull();
    });

    it("should return null for an attribute that is not a scalar", async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ ...diskEntity, attributes: { options: ["a", "b"] } }),
      );

      await expect(
        service.getEntity(diskEntity.entity_id, "options"),
      ).resolves.toBeNull();
    });

    it("should resolve to null when the request fails", async () => {
      mockFetch.mockRejectedValue(new TypeError("fetch failed"));

      await expect(
        service.getEntity(diskEntity.entity_id, "state"),
      ).resolves.toBeNull();
    });
  });
});
