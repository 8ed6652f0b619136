export { AccessControl, Role } from "./access-control.js";
