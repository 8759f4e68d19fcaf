import { MqConnectionProvider } from "./connection.provider";
import { QueueTransportFactoryProvider } from "./transport.provider";
import { MqShutdown } from "./shutdown.provider";

export const MQ_PROVIDERS = [
  MqConnectionProvider,
  QueueTransportFactoryProvider,
  MqShutdown,
];
