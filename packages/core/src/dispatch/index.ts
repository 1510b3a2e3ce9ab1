export { planCall } from "./dispatcher.js";
