import { OledDriverName } from "@core/types";
import { BaseOledDriver, SSD130X } from "./BaseOledDriver";

/**
 * SSD1306 controller driving a 128x32 panel with the internal charge pump
 */
export class Ssd1306Driver extends BaseOledDriver {
  readonly name = OledDriverName.SSD1306;
  readonly width = 128;
  readonly height = 32;

  protected initSequence(): number[] {
    return [
      SSD130X.DISPLAY_OFF,
      SSD130X.SET_DISPLAY_CLOCK_DIV,
      0x80,
      SSD130X.SET_MULTIPLEX,
      0x1f,
      SSD130X.SET_DISPLAY_OFFSET,
      0x00,
      SSD130X.SET_START_LINE | 0x00,
      SSD130X.CHARGE_PUMP,
      0x14,
      SSD130X.MEMORY_MODE,
      0x00,
      SSD130X.SEG_REMAP | 0x01,
      SSD130X.COM_SCAN_DEC,
      SSD130X.SET_COM_PINS,
      0x02,
      SSD130X.SET_CONTRAST,
      0x8f,
      SSD130X.SET_PRECHARGE,
      0xf1,
      SSD130X.SET_VCOM_DETECT,
      0x40,
      SSD130X.DISPLAY_ALL_ON_RESUME,
      SSD130X.NORMAL_DISPLAY,
    ];
  }
}
