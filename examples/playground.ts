import { GoogleGenAI } from "@google/genai";
import OpenAI from "openai";
import { join } from "path";
import {
  AttemptLog,
  ConfigManager,
  describeFunction,
  Reckoner,
  signatureFromSourceText,
  t,
} from "../src";

const PROJECT_ROOT = join(__dirname, "..");

const config = new ConfigManager(PROJECT_ROOT);
config.loadEnvironment();

function createClient(): { client: OpenAI | GoogleGenAI; model: string } {
  if (process.env.OPENAI_API_KEY) {
    return { client: new OpenAI({ apiKey: process.env.OPENAI_API_KEY }), model: "gpt-4.1-nano" };
  }
  if (process.env.GEMINI_API_KEY) {
    return { client: new GoogleGenAI({ apiKey: process.env.GEMINI_API_KEY }), model: "gemini-2.0-flash" };
  }
  throw new Error("Set OPENAI_API_KEY or GEMINI_API_KEY (or add them to a .env file)");
}

type Point = { x: number; y: number };

const Point = t.record<Point>("Point", { x: t.integer(), y: t.integer() });

const addNumbers = describeFunction((num1: number, num2: number): number => num1 + num2, {
  docstring: "Adds two numbers and returns the sum.",
  returns: "Integer",
});

const midpoint = (a: Point, b: Point): Point => a;

const capitals = signatureFromSourceText(
  `
  /** Capital city of each country, keyed by country name */
  function capitalsOf(countries: string[]): Record<string, string>;
  `,
  "capitalsOf"
);

async function main(): Promise<void> {
  const { client, model } = createClient();
  const auditLog = new AttemptLog();
  const reckon = new Reckoner(
    client,
    model,
    { ...config.getRetryConfig(), timeoutMs: config.getTimeoutMs() },
    { logLevel: config.getLogLevel(), auditLog }
  );

  console.log("Mercury is the closest planet to the sun:", await reckon.evaluate("Mercury is the closest planet to the sun"));

  const add = reckon.evaluate(addNumbers);
  console.log("3 + 5 =", await add(3, 5));

  const middle = reckon.evaluate(midpoint, {
    docstring: "Integer midpoint of the segment between a and b, rounding down.",
    returns: Point,
  });
  console.log("Midpoint", await middle({ x: 0, y: 0 }, { x: 4, y: 6 }));

  const capitalsOf = reckon.evaluate((countries: string[]): Record<string, string> => ({}), capitals);
  console.log("Capitals", await capitalsOf(["France", "Japan"]));

  console.log("Haiku:", await reckon.prompt("Write a haiku about retries"));
  console.log("Prime:", await reckon.prompt("Name a prime above 90", t.integer()));

  console.log("Attempts", auditLog.getSummary());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
