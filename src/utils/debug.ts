import registerDebug from "debug";

export const debug_matrix = registerDebug("sparse-nd:matrix");
export const debug_store = registerDebug("sparse-nd:store");
