import { OledDriverName } from "@core/types";
import { BaseOledDriver, SSD130X } from "./BaseOledDriver";

/**
 * SSD1309 controller driving a 128x64 panel.
 *
 * The SSD1309 has no charge pump; the panel is fed from an external VCC.
 */
export class Ssd1309Driver extends BaseOledDriver {
  readonly name = OledDriverName.SSD1309;
  readonly width = 128;
  readonly height = 64;

  protected initSequence(): number[] {
    return [
      SSD130X.DISPLAY_OFF,
      SSD130X.SET_DISPLAY_CLOCK_DIV,
      0xa0,
      SSD130X.SET_MULTIPLEX,
      0x3f,
      SSD130X.SET_DISPLAY_OFFSET,
      0x00,
      SSD130X.SET_START_LINE | 0x00,
      SSD130X.MEMORY_MODE,
      0x00,
      SSD130X.SEG_REMAP | 0x01,
      SSD130X.COM_SCAN_DEC,
      SSD130X.SET_COM_PINS,
      0x12,
      SSD130X.SET_CONTRAST,
      0xdf,
      SSD130X.SET_PRECHARGE,
      0x82,
      SSD130X.SET_VCOM_DETECT,
      0x34,
      SSD130X.DISPLAY_ALL_ON_RESUME,
      SSD130X.NORMAL_DISPLAY,
    ];
  }
}
