import * as core from "@actions/core";
import { handleAction } from "../lib/sync-action.js";

handleAction().catch((reason: unknown) => {
    core.setFailed(reason instanceof Error ? `${reason.message}\n${reason.stack}` : String(reason));
});
