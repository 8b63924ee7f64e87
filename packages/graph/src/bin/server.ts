#!/usr/bin/env node
import { runServer } from "@depgraph/core";

import { createServerOptions } from "../server.js";

runServer(createServerOptions());
