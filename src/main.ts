/**
 * Census Population Projections Connector
 *
 * Debug entry point: runs one sync against the local destination.
 */

import { NodeRuntime } from "@effect/platform-node";
import { program } from "./program";

NodeRuntime.runMain(program);
