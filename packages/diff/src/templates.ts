/**
 * Empty resource skeletons written into every helper bundle.
 * Used as the starting content when a resource is new to the target.
 */

export const FLOW_TEMPLATE_FILE = 'flow_template.json';
export const MODULE_TEMPLATE_FILE = 'module_template.json';

const FLOW_END_ACTION = '3f0c6d1e-8b2a-4c55-9e4d-5a7b1c2d3e4f';
const MODULE_END_ACTION = '7a9e2b4c-1d3f-4e6a-8b5c-0f1e2d3c4b5a';

export const FLOW_TEMPLATE = {
  Version: '2019-10-30',
  StartAction: FLOW_END_ACTION,
  Metadata: {
    entryPointPosition: { x: 40, y: 40 },
    ActionMetadata: {
      [FLOW_END_ACTION]: { position: { x: 200, y: 40 } },
    },
  },
  Actions: [
    {
      Identifier: FLOW_END_ACTION,
      Type: 'DisconnectParticipant',
      Parameters: {},
      Transitions: {},
    },
  ],
};

export const MODULE_TEMPLATE = {
  Version: '2019-10-30',
  StartAction: MODULE_END_ACTION,
  Metadata: {
    entryPointPosition: { x: 40, y: 40 },
    ActionMetadata: {
      [MODULE_END_ACTION]: { position: { x: 200, y: 40 } },
    },
  },
  Actions: [
    {
      Identifier: MODULE_END_ACTION,
      Type: 'EndFlowModuleExecution',
      Parameters: {},
      Transitions: {},
    },
  ],
  Settings: {
    InputParameters: [],
    OutputParameters: [],
    Transitions: [
      { DisplayName: 'Success', ReferenceName: 'Success', Description: '' },
      { DisplayName: 'Error', ReferenceName: 'Error', Description: '' },
    ],
  },
};

export function renderTemplate(template: object): string {
  return JSON.stringify(template, null, 2) + '\n';
}
