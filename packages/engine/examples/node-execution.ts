/**
 * Trigger a single node outside of any workflow
 */

import { createNode, fromBytes, toBytes } from '../src/index.js';

const getInput = createNode('get-input', ({ data }) => toBytes(`${fromBytes(data)} node1`));

const result = await getInput.trigger({ data: toBytes('input to') });

console.log(fromBytes(result));
