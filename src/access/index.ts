export { RoleRegistry, PauseSwitch } from "./roles.js";
