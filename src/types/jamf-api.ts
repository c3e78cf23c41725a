/**
 * Type definitions for the Jamf Pro Classic API group endpoints
 */

export const GROUP_SOURCES = ['computer-group', 'mobile-device-group', 'advanced-computer-search'] as const;

export type GroupSource = (typeof GROUP_SOURCES)[number];

export const RESPONSE_FORMATS = ['json', 'xml'] as const;

export type ResponseFormat = (typeof RESPONSE_FORMATS)[number];

/**
 * Where a group source lives in the Classic API and how its body is shaped.
 *
 * JSON bodies look like `{ [rootKey]: { id, name, [membersKey]: [...] } }`.
 * XML bodies look like `<rootKey><name/><membersKey><memberTag/>...</membersKey></rootKey>`.
 */
export interface ClassicGroupEndpoint {
  path: string;
  rootKey: string;
  membersKey: string;
  memberTag: string;
}

export const CLASSIC_GROUP_ENDPOINTS: Record<GroupSource, ClassicGroupEndpoint> = {
  'computer-group': {
    path: '/JSSResource/computergroups/id',
    rootKey: 'computer_group',
    membersKey: 'computers',
    memberTag: 'computer',
  },
  'mobile-device-group': {
    path: '/JSSResource/mobiledevicegroups/id',
    rootKey: 'mobile_device_group',
    membersKey: 'mobile_devices',
    memberTag: 'mobile_device',
  },
  'advanced-computer-search': {
    path: '/JSSResource/advancedcomputersearches/id',
    rootKey: 'advanced_computer_search',
    membersKey: 'computers',
    memberTag: 'computer',
  },
};

/**
 * Display field key the Classic API uses for "Operating System Version"
 * in advanced computer search results
 */
export const OS_VERSION_FIELD = 'Operating_System_Version';

export interface JamfAuthToken {
  token: string;
  expires: Date;
  issuedAt: Date;
}
