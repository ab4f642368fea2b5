import * as admin from "firebase-admin";

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

type ProcessEnv = Record<string, string | undefined>;

export function resolveBucketName(env: ProcessEnv = process.env): string | null {
  const directValue = env.STORAGE_BUCKET || env.FIREBASE_STORAGE_BUCKET || env.GCLOUD_STORAGE_BUCKET;
  if (directValue) {
    return directValue;
  }

  if (!env.FIREBASE_CONFIG) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(env.FIREBASE_CONFIG);
    if (typeof parsed === "object" && parsed !== null && "storageBucket" in parsed) {
      return typeof parsed.storageBucket === "string" && parsed.storageBucket ? parsed.storageBucket : null;
    }

    return null;
  } catch (_error) {
    return null;
  }
}

export function getStorageBucket() {
  const bucketName = resolveBucketName();
  if (bucketName) {
    return admin.storage().bucket(bucketName);
  }

  return admin.storage().bucket();
}

export function replayPathFor(battleId: string): string {
  return `battles/${battleId}/replay.json`;
}

export async function saveReplay(path: string, replay: unknown): Promise<number> {
  const replayJson = JSON.stringify(replay);
  await getStorageBucket().file(path).save(replayJson, {
    contentType: JSON_CONTENT_TYPE,
    resumable: false,
    metadata: {
      cacheControl: "no-cache",
    },
  });

  return Buffer.byteLength(replayJson, "utf8");
}

export async function loadReplay(path: string): Promise<unknown> {
  const [buffer] = await getStorageBucket().file(path).download();
  const parsed: unknown = JSON.parse(buffer.toString("utf8"));
  return parsed;
}
