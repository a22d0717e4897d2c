export type Abi = "none" | "wasi" | "emscripten";
export type CliOutputFormat = "text" | "json";
