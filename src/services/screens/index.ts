export { BaseScreen } from "./BaseScreen";
export type { ScreenOptions } from "./BaseScreen";
export { ExitScreen } from "./ExitScreen";
export { StatusScreen } from "./StatusScreen";
export type { StatusScreenOptions } from "./StatusScreen";
export { FontRegistry, defaultFontRegistry } from "./FontRegistry";
export { SvgFontRasterizer, estimateTextWidth } from "./SvgFontRasterizer";
