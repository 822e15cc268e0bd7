/**
 * Save a workflow to a store and run the copy fetched back by name
 */

import { InMemoryWorkflowStore, createNode, createWorkflow, fromBytes, toBytes } from '../src/index.js';

const step = (key: string, suffix: string) =>
  createNode(key, ({ data }) => toBytes(`${fromBytes(data)} ${suffix}`));

const getInput = step('get-input', 'node1');
const transform = step('transform-to-user', 'node2');
const validate = createNode('validate-user', () => toBytes('false'));
const save = step('save-user', 'node4');
const errorResponse = step('error-response', 'node5');
const successResponse = step('success-response', 'node6');
const sendResponse = step('send-response', 'node7');

const workflow = createWorkflow('add-user');
workflow.addNode(getInput, transform, validate, save, errorResponse, successResponse, sendResponse);
workflow.addEdge(getInput, transform);
workflow.addConditionalEdge(transform, validate, save, errorResponse);
workflow.addEdge(save, successResponse);
workflow.addEdge(successResponse, sendResponse);
workflow.addEdge(errorResponse, sendResponse);

const store = new InMemoryWorkflowStore();
await store.save(workflow);

const stored = await store.get(workflow.getName());
const result = await stored.execute(toBytes('from storage'));

console.log(fromBytes(result));
