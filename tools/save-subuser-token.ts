import { createComtradeClient } from '@comtrade/client';

async function main() {
  const email = process.argv[2];
  if (!email) {
    console.error('Usage: tsx tools/save-subuser-token.ts <email>');
    process.exit(1);
  }
  const client = createComtradeClient();
  await client.saveSubUserToken(email);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
