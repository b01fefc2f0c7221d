#!/usr/bin/env node
import { startServer } from "./server";

startServer();
