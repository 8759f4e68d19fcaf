export const MQ_CONNECTION = Symbol("MQ_CONNECTION");
export const QUEUE_TRANSPORT_FACTORY = Symbol("QUEUE_TRANSPORT_FACTORY");
