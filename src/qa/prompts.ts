/**
 * GraphQA - Default Prompts
 */

import { PromptTemplate } from '../llm/prompt.js';

export const SPARQL_GENERATION_TEMPLATE = `Write a SPARQL SELECT query for querying a graph database.
The ontology schema, in Turtle format and delimited by triple backticks, is:
\`\`\`
{schema}
\`\`\`
Use only the classes and properties provided in the schema to construct the SPARQL query.
Do not use any classes or properties that are not explicitly provided in the schema.
Include all necessary prefixes.
Do not include any explanations or apologies in your responses.
Do not wrap the query in backticks.
Do not include any text except the SPARQL query generated.
The question, delimited by triple backticks, is:
\`\`\`
{prompt}
\`\`\`
`;

export const SPARQL_FIX_TEMPLATE = `The following SPARQL query, delimited by triple backticks,
\`\`\`
{generated_sparql}
\`\`\`
is not valid.
The error, delimited by triple backticks, is
\`\`\`
{error_message}
\`\`\`
Give me a correct version of the SPARQL query.
Do not change the logic of the query.
Do not include any explanations or apologies in your responses.
Do not wrap the query in backticks.
Do not include any text except the SPARQL query generated.
The ontology schema, in Turtle format and delimited by triple backticks, is:
\`\`\`
{schema}
\`\`\`
`;

export const QA_TEMPLATE = `Task: Generate a natural language response from the results of a SPARQL query.
You are an assistant that creates well-written and human understandable answers.
The information part contains the information provided, which you can use to construct an answer.
The information provided is authoritative; never doubt it or use your internal knowledge to correct it.
Make your response sound like the information is coming from an AI assistant, but don't add any information.
Don't use internal knowledge to answer the question. Say you don't know if no information is available.
Information:
{context}

Question: {prompt}
Helpful Answer:`;

export const SPARQL_GENERATION_PROMPT = new PromptTemplate(SPARQL_GENERATION_TEMPLATE);
export const SPARQL_FIX_PROMPT = new PromptTemplate(SPARQL_FIX_TEMPLATE);
export const QA_PROMPT = new PromptTemplate(QA_TEMPLATE);
