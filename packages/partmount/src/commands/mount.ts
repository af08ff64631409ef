// IMPLEMENTATION_VALIDATION
import { defineCommand } from "citty";
import { runMount } from "@/lib/mount";
import {
  loadSettings,
  resolveMountConfig,
  resolveSettingsPath,
  SettingsConfigError,
  type PartmountSettings,
} from "@/lib/settings";

export const mountCommand = defineCommand({
  meta: {
    name: "partmount",
    version: "0.1.0",
    description:
      "Plan and mount an installed root from a JSON partition list",
  },
  args: {
    input: {
      type: "positional",
      description: "Path to the JSON partition list",
      required: true,
    },
    root: {
      type: "string",
      description: "Staging directory to mount the root under (default: /tmp/root)",
      required: false,
    },
    options: {
      type: "string",
      description: "Default mount options (default: defaults,noatime)",
      required: false,
    },
    subvolume: {
      type: "string",
      description: "Subvolume used when an entry names none (default: @)",
      required: false,
    },
    apply: {
      type: "boolean",
      description: "Create target directories and run mount instead of only planning",
      required: false,
    },
    report: {
      type: "string",
      description: "Write a JSON summary of the resolved mounts to this path",
      required: false,
    },
    settings: {
      type: "string",
      description: "Settings file (defaults to $PARTMOUNT_SETTINGS or ~/.config/partmount/settings.json)",
      required: false,
    },
  },
  run({ args }) {
    let settings: PartmountSettings;
    try {
      settings = loadSettings(args.settings);
    } catch (err) {
      if (err instanceof SettingsConfigError) {
        console.error(err.message);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    const overrides: PartmountSettings = {};
    if (args.root) overrides.rootMountPoint = resolveSettingsPath(args.root);
    if (args.options) overrides.defaultOptions = args.options;
    if (args.subvolume) overrides.defaultSubvolume = args.subvolume;
    if (args.apply) overrides.apply = true;

    const result = runMount({
      inputPath: args.input,
      config: resolveMountConfig(settings, overrides),
      reportPath: args.report,
    });

    if (result.exitCode === 0) {
      console.log(result.message);
    }

    process.exitCode = result.exitCode;
  },
});
