/**
 * Plugin manifest for the control-surface host.
 *
 * This is the typed counterpart of `entry.tp`, the file the host actually loads.
 * The host dispatches actions by these ids verbatim, so command validation in
 * the protocol adapter is built from the constants below.
 */

export const PLUGIN_ID = 'tp.plugin.websockets';
export const PLUGIN_NAME = 'Websockets';
export const PLUGIN_SDK = 6;
export const PLUGIN_VERSION = 10;

/** Value the host sends for a data field the user never filled in */
export const UNSET_VALUE = '<None>';

export const CATEGORY_ID = `${PLUGIN_ID}.main`;
export const SEND_MESSAGE_ACTION_ID = `${PLUGIN_ID}.act.sendmessage`;
export const DESTINATION_DATA_ID = `${SEND_MESSAGE_ACTION_ID}.data.destination`;
export const MESSAGE_DATA_ID = `${SEND_MESSAGE_ACTION_ID}.data.message`;

export interface ManifestDataField {
  id: string;
  type: 'text';
  label: string;
  default: string;
}

export interface ManifestAction {
  id: string;
  name: string;
  prefix: string;
  type: 'communicate';
  tryInline: boolean;
  /** `{$dataId$}` tokens are replaced by the host with inline inputs */
  format: string;
  data: ManifestDataField[];
}

export interface ManifestCategory {
  id: string;
  name: string;
  actions: ManifestAction[];
  events: unknown[];
  states: unknown[];
}

export interface PluginManifest {
  sdk: number;
  version: number;
  name: string;
  id: string;
  configuration: {
    colorDark: string;
    colorLight: string;
  };
  plugin_start_cmd: string;
  settings: unknown[];
  categories: ManifestCategory[];
}

export const SEND_MESSAGE_ACTION: ManifestAction = {
  id: SEND_MESSAGE_ACTION_ID,
  name: 'Send Message',
  prefix: PLUGIN_NAME,
  type: 'communicate',
  tryInline: true,
  format: `Send the text string {$${MESSAGE_DATA_ID}$} to {$${DESTINATION_DATA_ID}$}`,
  data: [
    { id: DESTINATION_DATA_ID, type: 'text', label: 'Destination', default: UNSET_VALUE },
    { id: MESSAGE_DATA_ID, type: 'text', label: 'Message', default: UNSET_VALUE },
  ],
};

export const PLUGIN_MANIFEST: PluginManifest = {
  sdk: PLUGIN_SDK,
  version: PLUGIN_VERSION,
  name: PLUGIN_NAME,
  id: PLUGIN_ID,
  configuration: {
    colorDark: '#25274c',
    colorLight: '#707ab5',
  },
  plugin_start_cmd: 'node %TP_PLUGIN_FOLDER%WebsocketsBridge/dist/server/index.js @config.yaml',
  settings: [],
  categories: [
    {
      id: CATEGORY_ID,
      name: PLUGIN_NAME,
      actions: [SEND_MESSAGE_ACTION],
      events: [],
      states: [],
    },
  ],
};
