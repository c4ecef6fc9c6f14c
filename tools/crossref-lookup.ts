import { createConsoleLoggerFromEnv } from '@libs/http-client-core';
import { createCrossRefClientFromEnv } from '@libs/crossref-client';

async function main() {
  const path = process.argv[2];
  if (!path) {
    console.error('Usage: tsx tools/crossref-lookup.ts <path> [filter]');
    console.error('  e.g. tsx tools/crossref-lookup.ts works "type:journal-article,from-pub-date:2024"');
    process.exit(1);
  }
  const filter = process.argv[3];

  const client = createCrossRefClientFromEnv({ logger: createConsoleLoggerFromEnv() });

  try {
    const body = await client.request(path, filter ? { filter, rows: 5 } : {});
    console.log(JSON.stringify(body, null, 2));
  } finally {
    await client.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
