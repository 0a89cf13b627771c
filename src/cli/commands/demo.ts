import type { EwsAnalyzerClient } from "../../client/analyzer-client.js";
import { printJson, printSection } from "../utils.js";

const SAMPLE_EWS_CODE = `
using Microsoft.Exchange.WebServices.Data;

var service = new ExchangeService(ExchangeVersion.Exchange2013);
service.Credentials = new WebCredentials("user@contoso.com", "test-password");
var results = service.FindItems(WellKnownFolderName.Inbox, new ItemView(50));
`;

const SAMPLE_CALL_SITE = "service.FindItems(WellKnownFolderName.Inbox, new ItemView(50))";

const SAMPLE_AUTH_CODE =
  'var service = new ExchangeService(); service.Credentials = new WebCredentials("user", "test-password");';

const SAMPLE_SDK_MEMBER = "Microsoft.Exchange.WebServices.Data.ExchangeService.FindItems";

/** Walk through the main tools once, printing each result. */
export async function runDemo(client: EwsAnalyzerClient): Promise<void> {
  printSection("Available Tools");
  const tools = await client.listTools();
  for (const tool of tools) {
    process.stdout.write(`  ${tool.name.padEnd(25)} ${tool.description}\n`);
  }
  process.stdout.write("\n");

  printSection("Analyzing EWS Code");
  printJson(await client.analyzeCode(SAMPLE_EWS_CODE));
  process.stdout.write("\n");

  printSection("Converting to Graph SDK");
  printJson(await client.convertToGraph(SAMPLE_CALL_SITE));
  process.stdout.write("\n");

  printSection("Converting Authentication");
  printJson(await client.convertAuth(SAMPLE_AUTH_CODE, "clientCredential"));
  process.stdout.write("\n");

  printSection("Roadmap Lookup");
  printJson(await client.getRoadmap(SAMPLE_SDK_MEMBER));
  process.stdout.write("\n");
}
