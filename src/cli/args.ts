import { z } from "zod";
import type { RenderConfig } from "../types.js";
import {
  DEFAULT_BACKGROUND,
  DEFAULT_FOREGROUND,
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
  MAX_IMAGE_DIMENSION,
  PROGRAM_NAME,
} from "../constants.js";
import { tryParseHexColor } from "../utils/colorUtils.js";
import { DimensionError, UsageError } from "../errors.js";

export const HELP_TEXT = `Usage: ${PROGRAM_NAME} [options]

Options:
  -i <input file>      Input audio file path
  -o <output file>     Output PNG image path
  -s <start time>      Start time in seconds (default: 0)
  -e <end time>        End time in seconds, 0 means until end, negative means seconds from end (default: 0)
  -w <width>           Image width in pixels (default: ${DEFAULT_WIDTH}, max: ${MAX_IMAGE_DIMENSION})
  -h <height>          Image height in pixels (default: ${DEFAULT_HEIGHT}, max: ${MAX_IMAGE_DIMENSION})
  -b <RRGGBBAA>        Background color in RRGGBBAA hex (default: 000000FF)
  -f <RRGGBBAA>        Waveform color in RRGGBBAA hex (default: FFFFFFFF)
  --help               Show this help

Example:
  ${PROGRAM_NAME} -i "song.wav" -o "waveform.png" -s 5 -e 30 -w 1920 -h 300 -b 1e1e1eff -f 00ffffff
`;

export type CliCommand = { kind: "help" } | { kind: "render"; config: RenderConfig };

const FLAGS = {
  "-i": "inputPath",
  "-o": "outputPath",
  "-s": "startSeconds",
  "-e": "endSeconds",
  "-w": "width",
  "-h": "height",
  "-b": "backgroundColor",
  "-f": "foregroundColor",
} as const;

type Flag = keyof typeof FLAGS;
type RawArgs = Partial<Record<(typeof FLAGS)[Flag], string>>;

function isFlag(key: string): key is Flag {
  return Object.hasOwn(FLAGS, key);
}

const FLAG_FOR_FIELD: Record<string, string> = Object.fromEntries(
  Object.entries(FLAGS).map(([flag, field]): [string, string] => [field, flag]),
);

const seconds = z
  .string()
  .trim()
  .min(1, "expected a number")
  .pipe(z.coerce.number({ invalid_type_error: "expected a number" }).finite("expected a number"));

const pixels = z
  .string()
  .trim()
  .min(1, "expected a whole number of pixels")
  .pipe(
    z.coerce
      .number({ invalid_type_error: "expected a whole number of pixels" })
      .int("expected a whole number of pixels")
      .positive("must be greater than 0"),
  );

const color = z.string().transform((value, ctx) => {
  const parsed = tryParseHexColor(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid color "${value}", expected RRGGBBAA` });
    return z.NEVER;
  }
  return parsed;
});

const renderArgsSchema = z.object({
  inputPath: z.string({ required_error: "missing input file" }).min(1, "missing input file"),
  outputPath: z.string({ required_error: "missing output file" }).min(1, "missing output file"),
  startSeconds: seconds.optional(),
  endSeconds: seconds.optional(),
  width: pixels.optional(),
  height: pixels.optional(),
  backgroundColor: color.optional(),
  foregroundColor: color.optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = String(issue.path[0] ?? "");
      const flag = FLAG_FOR_FIELD[field];
      return flag ? `${flag}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/** Collect flag values; `--help` wins over anything that follows it. */
function collectArgs(argv: readonly string[]): RawArgs | "help" {
  const raw: RawArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const key = argv[i]!.trim();
    if (key === "--help") return "help";
    const value = argv[i + 1];
    if (isFlag(key) && value !== undefined) {
      raw[FLAGS[key]] = value;
      i++;
      continue;
    }
    throw new UsageError(
      isFlag(key) ? `Missing value for ${key}` : `Unknown option: ${key}`,
      { option: key },
    );
  }
  return raw;
}

/**
 * Turn command-line arguments (without the node/script prefix) into a
 * command. The returned config is the one immutable configuration for the
 * whole render.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  if (argv.length === 0) throw new UsageError("No arguments given");

  const raw = collectArgs(argv);
  if (raw === "help") return { kind: "help" };

  const result = renderArgsSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(describeIssues(result.error), { issues: result.error.issues });
  }

  const args = result.data;
  const width = args.width ?? DEFAULT_WIDTH;
  const height = args.height ?? DEFAULT_HEIGHT;
  if (width > MAX_IMAGE_DIMENSION || height > MAX_IMAGE_DIMENSION) {
    throw new DimensionError(`Image size too large. Max: ${MAX_IMAGE_DIMENSION}`, {
      width,
      height,
      max: MAX_IMAGE_DIMENSION,
    });
  }

  return {
    kind: "render",
    config: {
      inputPath: args.inputPath,
      outputPath: args.outputPath,
      startSeconds: args.startSeconds ?? 0,
      endSeconds: args.endSeconds ?? 0,
      canvas: {
        width,
        height,
        backgroundColor: args.backgroundColor ?? DEFAULT_BACKGROUND,
        foregroundColor: args.foregroundColor ?? DEFAULT_FOREGROUND,
      },
    },
  };
}
