import { createHash } from "crypto";
import { createReadStream } from "fs";

export async function hashFileAsync(path: string): Promise<string> {
  return await new Promise((resolve, reject) => {
    const hasher = createHash("sha256");
    const stream = createReadStream(path);
    stream.on("data", (chunk) => hasher.update(chunk));
    stream.on("error", (err) => reject(err));
    stream.on("end", () => resolve(hasher.digest("hex")));
  });
}

export async function filesEqual(left: string, right: string): Promise<boolean> {
  const [leftHash, rightHash] = await Promise.all([hashFileAsync(left), hashFileAsync(right)]);
  return leftHash === rightHash;
}
