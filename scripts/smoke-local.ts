import { EXAMPLES } from "../src/api/contracts";

const run = async (): Promise<void> => {
  const baseUrl = process.env.BASE_URL ?? "http://127.0.0.1:3000";
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (process.env.API_KEY) headers["x-api-key"] = process.env.API_KEY;

  const health: unknown = await (await fetch(`${baseUrl}/v1/health`)).json();
  const ready: unknown = await (await fetch(`${baseUrl}/v1/ready`)).json();
  const domains: unknown = await (await fetch(`${baseUrl}/v1/domains`, { headers })).json();
  const extractResponse = await fetch(`${baseUrl}/v1/extract`, {
    method: "POST",
    headers,
    body: JSON.stringify({
      ...EXAMPLES.extractRequest,
      url: process.env.SMOKE_URL ?? EXAMPLES.extractRequest.url,
    }),
  });
  const extracted: unknown = await extractResponse.json();

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      { health, ready, domains, extract: { status: extractResponse.status, body: extracted } },
      null,
      2,
    ),
  );
};

run().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
