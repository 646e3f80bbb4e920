export function keywordStrategyPrompt(args: {
  clientName: string;
  industry: string;
  services: string[];
  location: string;
  language: string;
  existingKeywords: string[];
  count: number;
}) {
  const system = `You are an SEO consultant specialised in content strategy.
Your job is to plan which keywords a blog should target to maximise a business's organic traffic.

Respond ONLY with valid JSON, no extra text and no backticks.`;

  const user = `Build a keyword strategy for this business's blog:

BUSINESS: ${args.clientName}
INDUSTRY: ${args.industry}
SERVICES/PRODUCTS: ${args.services.join(', ')}
LOCATION: ${args.location}
KEYWORD LANGUAGE: ${args.language}
KEYWORDS ALREADY USED (do not repeat): ${args.existingKeywords.length ? args.existingKeywords.join(', ') : 'none'}

Generate ${args.count} keywords organised in topic clusters.

REQUIRED JSON FORMAT:
{
  "clusters": [
    {
      "nombre": "Topic cluster name",
      "pillar_keyword": "the cluster's main competitive keyword",
      "pillar_titulo_sugerido": "Suggested title for the pillar article",
      "keywords": [
        {
          "keyword": "specific long-tail keyword",
          "intencion": "informacional | transaccional | navegacional",
          "dificultad_estimada": "baja | media | alta",
          "volumen_estimado": "alto | medio | bajo",
          "titulo_sugerido": "Suggested SEO title for the article",
          "keywords_secundarias": ["related keyword", "another related keyword"],
          "prioridad": 1
        }
      ]
    }
  ]
}

SELECTION CRITERIA:
- Mix informational keywords (attract traffic) and transactional ones (convert)
- Prefer long-tail keywords with less competition
- Include local-intent keywords where relevant (city/region)
- 3-5 keywords per cluster
- Each cluster's pillar is its most competitive keyword
- Clusters should link naturally to the business's services
- "prioridad" is an integer from 1 (low) to 5 (high)
`;

  return { system, user };
}
