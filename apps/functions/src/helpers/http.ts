import https from 'https';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** GET a JSON document over https. Non-2xx responses reject with `label` in the message. */
export const httpsGetJson = async (url: URL, label: string, agent?: https.Agent): Promise<unknown> => {
  const bodyStr = await new Promise<string>((resolve, reject) => {
    const req = https.request(
      {
        method: 'GET',
        hostname: url.hostname,
        path: url.pathname + url.search,
        headers: { Accept: 'application/json' },
        agent,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (c: Buffer) => chunks.push(c));
        res.on('end', () => {
          const text = Buffer.concat(chunks).toString('utf-8');
          if (res.statusCode && res.statusCode >= 200 && res.statusCode < 300) resolve(text);
          else reject(new Error(`${label} error: ${res.statusCode} ${res.statusMessage} - ${text.slice(0, 500)}`));
        });
      },
    );
    req.on('error', reject);
    req.end();
  });
  return JSON.parse(bodyStr);
};

/** First array found under one of `keys`, keeping only object entries. */
export const recordsOf = (json: unknown, keys: string[]): Record<string, unknown>[] => {
  if (!isRecord(json)) return [];
  for (const key of keys) {
    const list = json[key];
    if (Array.isArray(list)) return list.filter(isRecord);
  }
  return [];
};

export const totalRecordsOf = (json: unknown): number =>
  isRecord(json) ? Number(json.totalRecords ?? json.total ?? 0) || 0 : 0;
