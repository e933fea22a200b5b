import { IMetricsService } from "@core/interfaces";
import { EntityValue, StatusEntities } from "@core/types";
import {
  STATUS_PING_UNAVAILABLE,
  STATUS_VALUE_MISSING,
} from "@core/constants";
import { getHostname } from "@utils/system";
import { BaseScreen, ScreenOptions } from "./BaseScreen";

export type StatusScreenOptions = ScreenOptions & {
  /** Source of the system monitor entities */
  metrics: IMetricsService;

  /** Host name lookup, the operating system's by default */
  hostname?: () => string;
};

const show = (value: EntityValue): string =>
  value === null ? STATUS_VALUE_MISSING : String(value);

/**
 * System status: host and time, resource use, addresses, WAN quality and
 * uptime, one line each.
 */
export class StatusScreen extends BaseScreen {
  private readonly metrics: IMetricsService;
  private readonly hostname: () => string;

  constructor(options: StatusScreenOptions) {
    super(options);
    this.metrics = options.metrics;
    this.hostname = options.hostname ?? getHostname;
  }

  /**
   * Read the entities and build the five lines of the screen
   */
  async buildLines(): Promise<string[]> {
    const state = (entityId: string) => this.metrics.getEntity(entityId, "state");

    const hostnameLine = `${this.hostname()} ${this.display.humanReadableTimeNow()}`;

    const mem = await state(StatusEntities.memoryUsage);
    const cpu = await state(StatusEntities.processorUse);
    const disk = await state(StatusEntities.diskUsage);
    const temp = await state(StatusEntities.processorTemperature);
    const resourceLine = `C${show(cpu)}% M${show(mem)}% D${show(disk)}% t${show(temp)}°C`;

    const ipEth = await state(StatusEntities.ipEthernet);
    const ipWlan = await state(StatusEntities.ipWireless);
    const ipLine = `A ${show(ipEth)} ${show(ipWlan)}`;

    const pingStatus = await state(StatusEntities.pingStatus);
    const pingLatency = await state(StatusEntities.pingLatency);
    const ping =
      pingStatus === "on" ? show(pingLatency) : STATUS_PING_UNAVAILABLE;
    const download = await state(StatusEntities.wanDownload);
    const upload = await state(StatusEntities.wanUpload);
    const wanLine = `P${ping} U${show(upload)} D${show(download)}`;

    const lastBoot = await state(StatusEntities.lastBoot);
    const bootLine =
      lastBoot === null
        ? `B ${STATUS_VALUE_MISSING}`
        : `B ${this.display.humanReadableTimeSince(String(lastBoot))}`;

    this.logger.info(hostnameLine);
    this.logger.info(ipLine);
    this.logger.info(resourceLine);
    this.logger.info(wanLine);
    this.logger.info(bootLine);

    return [hostnameLine, resourceLine, ipLine, wanLine, bootLine];
  }

  async render(): Promise<void> {
    await this.displayText(await this.buildLines());
    await this.renderWithDefaults();
  }
}
