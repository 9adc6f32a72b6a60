export type { ProcessLauncher, LaunchParams, LaunchedProcess } from "./ProcessLauncher.js";
