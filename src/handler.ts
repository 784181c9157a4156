import { createLambdaHandler } from "./app/lambda.js";

export const handler = createLambdaHandler();
