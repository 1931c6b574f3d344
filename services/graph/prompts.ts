import { PromptTemplate } from '@langchain/core/prompts';

// Translates a question into a Cypher statement for the given schema
export const CYPHER_GENERATION_TEMPLATE = `Task: Generate a Cypher statement to query a graph database.
Instructions:
Use only the relationship types and properties provided in the schema.
Do not use any other relationship types or properties that are not provided.
Schema:
{schema}
Note: Do not include any explanations or apologies in your response.
Do not respond to any question that asks for anything other than a Cypher statement.
Return ONLY the raw Cypher statement without markdown formatting or code blocks.

The question is:
{question}`;

const KUZU_EXTRA_INSTRUCTIONS = `Instructions:

Generate the statement in the Kùzu Cypher dialect rather than standard Cypher:
1. Do not use a \`WHERE EXISTS\` clause to check whether a property exists; Kùzu has a fixed schema.
2. Do not omit the relationship pattern. Always write \`()-[]->()\` instead of \`()->()\`.
3. Do not include notes or comments, even if the statement does not produce the expected result.
`;

export const KUZU_GENERATION_TEMPLATE = CYPHER_GENERATION_TEMPLATE.replace(
  'Generate a Cypher statement',
  'Generate a Kùzu Cypher statement'
).replace('Instructions:', KUZU_EXTRA_INSTRUCTIONS);

// Turns the rows returned by the generated query into an answer
export const CYPHER_QA_TEMPLATE = `You are an assistant that helps users understand information from a graph database.
The information part contains the data returned for the question; use it to construct your answer.
The provided information is authoritative. Never doubt it or use your internal knowledge to correct it.
Make the answer sound like a response to the question. Do not mention that you got this information from the context.
If the provided information is empty, say that you don't know the answer.
Information:
{context}

Question: {question}
Helpful Answer:`;

export const CYPHER_GENERATION_PROMPT = PromptTemplate.fromTemplate(CYPHER_GENERATION_TEMPLATE);
export const KUZU_GENERATION_PROMPT = PromptTemplate.fromTemplate(KUZU_GENERATION_TEMPLATE);
export const CYPHER_QA_PROMPT = PromptTemplate.fromTemplate(CYPHER_QA_TEMPLATE);
