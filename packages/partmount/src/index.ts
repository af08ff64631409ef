#!/usr/bin/env node
import { runMain } from "citty";
import { mountCommand } from "@/commands/mount";

void runMain(mountCommand);
