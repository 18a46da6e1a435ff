import { RegistryNode } from '../src/common/RegistryNode';
import { DEFAULT_CONFIG } from '../src/config/RegistryConfiguration';
import { RegistryClient } from '../src/client/RegistryClient';
import { RegistryWatcher } from '../src/client/RegistryWatcher';

/**
 * Starts a registry on an ephemeral port, watches it, registers an
 * instance with a heartbeat loop, looks it up and shuts everything down.
 */
async function demonstrateRegistry(): Promise<void> {
  console.log('=== Service Registry Demonstration ===\n');

  const node = new RegistryNode({
    ...DEFAULT_CONFIG,
    server: { ...DEFAULT_CONFIG.server, host: '127.0.0.1', port: 0 },
    logging: { enableRegistryLogs: true }
  });
  await node.start();

  const address = node.getAddress();
  if (!address) {
    throw new Error('registry did not bind an address');
  }
  console.log(`1. Registry listening on ${address.host}:${address.port}\n`);

  const watcher = new RegistryWatcher({ url: `ws://${address.host}:${address.port}/ws` });
  watcher.on('registry-event', (event) => {
    console.log(`   ← ${event.action} ${event.service.serviceName}/${event.service.id}`);
  });
  await watcher.connect();

  const client = new RegistryClient({ baseUrl: `http://${address.host}:${address.port}` });

  console.log('2. Registering payments/p-1 with a 1s heartbeat...');
  await client.autoRegister({
    serviceName: 'payments',
    id: 'p-1',
    host: '10.0.0.5',
    port: 8080,
    mode: 'prod',
    metadata: { environment: 'prod', region: 'eu-west', version: 3 }
  }, 1000);

  await new Promise<void>(resolve => setTimeout(resolve, 1500));

  console.log('\n3. Looking up payments in eu-west...');
  const found = await client.lookup({ service: 'payments', metadata: { region: 'eu-west' } });
  console.log(`   ✓ ${found.length} instance(s): ${found.map(instance => `${instance.host}:${instance.port}`).join(', ')}\n`);

  console.log('4. Deregistering and shutting down...');
  client.stopHeartbeat();
  await client.deregister('payments', 'p-1');
  await watcher.close();
  await node.stop();

  console.log('\n=== Demonstration Complete ===');
}

export { demonstrateRegistry };
