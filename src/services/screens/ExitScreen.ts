import { BaseScreen } from "./BaseScreen";

/**
 * Shown once when the service shuts down
 */
export class ExitScreen extends BaseScreen {
  async render(): Promise<void> {
    await this.displayText(["GOOD BYE"]);
    await this.renderWithDefaults();
  }
}
