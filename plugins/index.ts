import "./shell";
import "./template";
import "./typescript";

export { createToolSession, plugins, selectToolPlugin } from "./protocol";
export type { ToolPlugin } from "./protocol";
export { ShellPlugin } from "./shell";
export { TemplatePlugin } from "./template";
export { TypeScriptPlugin } from "./typescript";
