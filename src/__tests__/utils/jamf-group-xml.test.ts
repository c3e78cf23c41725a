import { describe, expect, test } from '@jest/globals';
import { parseGroupSummaryFromXml, parseOsVersionsFromXml } from '../../utils/jamf-group-xml.js';
import { CLASSIC_GROUP_ENDPOINTS } from '../../types/jamf-api.js';

const computerGroup = CLASSIC_GROUP_ENDPOINTS['computer-group'];
const mobileGroup = CLASSIC_GROUP_ENDPOINTS['mobile-device-group'];

describe('parseGroupSummaryFromXml', () => {
  test('reads the group name and the size of its members', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<computer_group>
  <id>12</id>
  <name>Sales &amp; Marketing</name>
  <is_smart>true</is_smart>
  <site>
    <id>-1</id>
    <name>None</name>
  </site>
  <criteria>
    <size>1</size>
    <criterion>
      <name>Department</name>
      <value>Sales</value>
    </criterion>
  </criteria>
  <computers>
    <size>2</size>
    <computer><id>1</id><name>mac-01</name></computer>
    <computer><id>2</id><name>mac-02</name></computer>
  </computers>
</computer_group>`;

    expect(parseGroupSummaryFromXml(xml, computerGroup)).toEqual({ name: 'Sales & Marketing', count: 2 });
  });

  test('counts member elements when size is absent', () => {
    const xml = `<mobile_device_group>
  <id>4</id>
  <name>Shared iPads</name>
  <mobile_devices>
    <mobile_device><id>1</id></mobile_device>
    <mobile_device><id>2</id></mobile_device>
    <mobile_device><id>3</id></mobile_device>
  </mobile_devices>
</mobile_device_group>`;

    expect(parseGroupSummaryFromXml(xml, mobileGroup)).toEqual({ name: 'Shared iPads', count: 3 });
  });

  test('treats an empty members element as zero', () => {
    const xml = '<computer_group><id>3</id><name>Empty</name><computers/></computer_group>';

    expect(parseGroupSummaryFromXml(xml, computerGroup)).toEqual({ name: 'Empty', count: 0 });
  });

  test('returns null without a members container', () => {
    const xml = '<computer_group><id>3</id><name>Broken</name></computer_group>';

    expect(parseGroupSummaryFromXml(xml, computerGroup)).toBeNull();
  });

  test('returns null without a group name', () => {
    const xml = '<computer_group><id>3</id><computers><size>0</size></computers></computer_group>';

    expect(parseGroupSummaryFromXml(xml, computerGroup)).toBeNull();
  });
});

describe('parseOsVersionsFromXml', () => {
  test('reads the OS version display field of each computer', () => {
    const xml = `<advanced_computer_search>
  <id>7</id>
  <name>OS Inventory</name>
  <computers>
    <size>3</size>
    <computer>
      <id>1</id>
      <name>mac-01</name>
      <Operating_System_Version>14.5</Operating_System_Version>
    </computer>
    <computer>
      <id>2</id>
      <name>mac-02</name>
      <Operating_System_Version/>
    </computer>
    <computer>
      <id>3</id>
      <name>mac-03</name>
      <Operating_System_Version>13.6.7</Operating_System_Version>
    </computer>
  </computers>
</advanced_computer_search>`;

    expect(parseOsVersionsFromXml(xml)).toEqual([{ osVersion: '14.5' }, {}, { osVersion: '13.6.7' }]);
  });

  test('returns null without a computers container', () => {
    expect(parseOsVersionsFromXml('<advanced_computer_search><name>x</name></advanced_computer_search>')).toBeNull();
  });
});
