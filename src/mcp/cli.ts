import { createDoodleJournalServer, serverMetadata } from './server.js';

export interface RunDoodleJournalServerOptions {
  readonly transportType?: 'stdio' | 'httpStream';
}

const DEFAULT_TRANSPORT: RunDoodleJournalServerOptions['transportType'] = 'stdio';

export const runDoodleJournalServer = async (
  options: RunDoodleJournalServerOptions = {},
): Promise<void> => {
  const transportType = options.transportType ?? DEFAULT_TRANSPORT;
  const server = createDoodleJournalServer();

  console.info(
    `[${serverMetadata.name}] starting (version=${serverMetadata.version}, transport=${transportType})`,
  );

  await server.start({ transportType });
};
