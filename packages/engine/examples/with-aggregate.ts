/**
 * Conditional routing into a parallel fan-out, joined by an aggregate
 * node. Writes the graph to `<workflow>.gv`.
 */

import { writeFileSync } from 'fs';
import { createNode, createWorkflow, fromBytes, toBytes, type NodeAction } from '../src/index.js';

const append =
  (suffix: string): NodeAction =>
  ({ data }) =>
    toBytes(`${fromBytes(data)} ${suffix}`);

const getInput = createNode('get-input', append('node1'));
const transformUser = createNode('transform-user', append('node2'));
const validateUser = createNode('validate-user', () => toBytes('true'));
const saveUser = createNode('save-user', ({ data }) => toBytes(`save-user ${fromBytes(data)}`));
const errorResponse = createNode('error-response', ({ data }) =>
  toBytes(`error-response ${fromBytes(data)}`)
);
const sendSms = createNode('send-sms', append('send-sms'));
const sendNotification = createNode('send-notification', append('send-notification'));
const sendEmail = createNode('send-email', append('send-email'));
const successResponse = createNode('success-response', params =>
  toBytes(
    `success-response [aggregate][${fromBytes(params['send-sms'])}, ${fromBytes(
      params['send-notification']
    )}, ${fromBytes(params['send-email'])}] ${fromBytes(params.data)}`
  )
);
const sendResponse = createNode('send-response', append('send-response'));

const workflow = createWorkflow('add-user');
workflow.addNode(
  getInput,
  transformUser,
  validateUser,
  saveUser,
  errorResponse,
  sendSms,
  sendNotification,
  sendEmail,
  successResponse,
  sendResponse
);
workflow.addEdge(getInput, transformUser);
workflow.addConditionalEdge(transformUser, validateUser, saveUser, errorResponse);
workflow.addParallelEdge(saveUser, successResponse, sendSms, sendNotification, sendEmail);
workflow.addEdge(successResponse, sendResponse);
workflow.addEdge(errorResponse, sendResponse);

const result = await workflow.execute(toBytes('hallo'));
console.log(fromBytes(result));

writeFileSync(`${workflow.getName()}.gv`, workflow.export());
