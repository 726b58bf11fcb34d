export * from './identity/index.js';
export { consoleSink, silentSink, type LogSink } from './log.js';
export { MqttBuilder } from './mqtt/builder.js';
export * from './mqtt/config.js';
export { MqttConnection, mqttConnector, type Connector, type MqttClientLike } from './mqtt/connection.js';
export { builderFromSettings, loadSettings, SettingsSchema, type Settings } from './settings.js';
