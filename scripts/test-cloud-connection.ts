/**
 * Test the connection to the Cloud broker and publish one test message.
 *
 * Usage: npm run test-connection
 * Uses the same environment variables as the relay (CLOUD_MQTT_URL, EDGE_ID, ...).
 */

import { config } from "../src/config.ts";
import { CloudLink } from "../src/links/cloud-link.ts";
import { MqttTransport } from "../src/links/mqtt-transport.ts";

const CONNECT_WAIT_MS = 5_000;

const link = new CloudLink({
  url: config.cloud.url,
  commandTopic: config.cloud.commandTopic,
  publishTimeoutMs: 10_000,
  transport: new MqttTransport({
    url: config.cloud.url,
    clientId: `${config.cloud.clientId}_test`,
    connectTimeoutMs: 10_000,
    // Single attempt
    reconnectPeriodMs: 0,
    keepaliveSec: config.mqtt.keepaliveSec,
  }),
  logLevel: "warn",
});

function waitForConnection(timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(false);
    }, timeoutMs);
    const unsubscribe = link.on("connected", () => {
      clearTimeout(timer);
      unsubscribe();
      resolve(true);
    });
  });
}

async function run(): Promise<boolean> {
  console.log("Testing connection to cloud MQTT broker...");
  console.log(`  Server: ${config.cloud.url}`);

  const connected = waitForConnection(CONNECT_WAIT_MS);
  link.start();

  if (!(await connected)) {
    console.log("Connection failed - check the broker URL and firewall");
    return false;
  }

  const sent = await link.send(config.cloud.dataTopic, {
    node_id: "connection_test",
    edge_id: config.edge.id,
    message: "Cloud sync test",
    timestamp: new Date().toISOString(),
  });

  console.log("Connected successfully!");
  if (sent) {
    console.log(`Test message sent to topic: ${config.cloud.dataTopic}`);
  } else {
    console.log(`Test message to ${config.cloud.dataTopic} was not acknowledged`);
  }
  return sent;
}

run()
  .then(async (ok) => {
    await link.stop();
    process.exit(ok ? 0 : 1);
  })
  .catch(async (err: unknown) => {
    console.error("Connection error:", err);
    await link.stop();
    process.exit(1);
  });
