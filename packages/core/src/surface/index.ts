export { CommanderSurface } from "./commander-surface.js";
