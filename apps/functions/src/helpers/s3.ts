import { GetObjectCommand, ListObjectsV2Command, S3Client } from '@aws-sdk/client-s3';

export const s3 = new S3Client({});

export async function getObjectBuffer(bucket: string, key: string, client: S3Client = s3): Promise<Buffer> {
  const obj = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
  if (!obj.Body) throw new Error('S3 object body is empty');
  return Buffer.from(await obj.Body.transformToByteArray());
}

/** Every object key under prefix, folders excluded. */
export async function listObjectKeys(bucket: string, prefix: string, client: S3Client = s3): Promise<string[]> {
  const keys: string[] = [];
  let continuationToken: string | undefined;

  do {
    const res = await client.send(
      new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken }),
    );
    for (const obj of res.Contents ?? []) {
      if (obj.Key && !obj.Key.endsWith('/')) keys.push(obj.Key);
    }
    continuationToken = res.IsTruncated ? res.NextContinuationToken : undefined;
  } while (continuationToken);

  return keys.sort();
}
