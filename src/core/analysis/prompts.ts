export const ANALYST_PREAMBLE =
  'You are an expert investment analyst specializing in early-stage startup evaluation. Analyze the following pitch deck content and provide a comprehensive investment analysis report.';

export const ANALYSIS_RUBRIC = `**ANALYSIS REQUIREMENTS:**
Please provide a detailed analysis covering the following areas:

1. **COMPANY OVERVIEW**
   - Company name, mission, and vision
   - Industry and market sector
   - Stage of development (pre-seed, seed, Series A, etc.)
   - Geographic location and target markets

2. **BUSINESS MODEL ANALYSIS**
   - Revenue model and monetization strategy
   - Unit economics and pricing strategy
   - Customer acquisition strategy
   - Scalability potential

3. **MARKET ANALYSIS**
   - Total Addressable Market (TAM), Serviceable Addressable Market (SAM), Serviceable Obtainable Market (SOM)
   - Market trends and growth potential
   - Competitive landscape
   - Market timing and opportunity

4. **PRODUCT/SERVICE EVALUATION**
   - Product description and unique value proposition
   - Technology stack and innovation level
   - Product-market fit evidence
   - Competitive advantages and moats

5. **TEAM ASSESSMENT**
   - Founder backgrounds and expertise
   - Team composition and key personnel
   - Advisory board and investors
   - Execution capability assessment

6. **FINANCIAL ANALYSIS**
   - Current financial status
   - Revenue projections and growth trajectory
   - Funding requirements and use of funds
   - Key financial metrics and assumptions

7. **TRACTION AND MILESTONES**
   - Customer traction and user metrics
   - Revenue growth and key achievements
   - Partnerships and strategic relationships
   - Product development milestones

8. **RISK ASSESSMENT**
   - Market risks and competitive threats
   - Execution risks and operational challenges
   - Financial risks and funding concerns
   - Regulatory and compliance risks

9. **INVESTMENT RECOMMENDATION**
   - Overall investment attractiveness (1-10 scale)
   - Key strengths and opportunities
   - Major concerns and red flags
   - Recommended due diligence areas

10. **ADDITIONAL RESEARCH SUGGESTIONS**
    - Key questions for management team
    - Areas requiring deeper investigation
    - Comparable companies for benchmarking
    - Industry experts to consult`;

export const ONLINE_RESEARCH_INSTRUCTIONS = `**IMPORTANT - WEB RESEARCH INSTRUCTIONS:**
The pitch deck references external websites that were visited and scraped. The scraped content is included below.
You MUST add a dedicated section titled "## Information Found Online" to your report that:
- Summarizes what each successfully scraped website reveals about the company
- Highlights facts found online that confirm, extend or contradict claims made in the pitch deck
- Notes any websites that could not be accessed and what that means for the assessment
- Uses specific details from the scraped content rather than general statements`;

export const OUTPUT_FORMAT_INSTRUCTIONS = `**OUTPUT FORMAT:**
Please structure your response as a well-formatted markdown document suitable for an investment manager. Use clear headings, bullet points, and professional language. Be specific and actionable in your recommendations.

If any information is missing from the pitch deck, clearly indicate what additional information would be valuable for a complete assessment.`;

export const IMAGES_NOTE = `**VISUAL CONTENT:**
Images of the pitch deck slides are attached after this text. Examine them for charts, metrics, product screenshots, team photos and any information that does not appear in the extracted text, and include it in your analysis.`;

export interface AnalysisPromptInput {
  text: string;
  linksSummary?: string;
  enrichmentText?: string;
  hasImages: boolean;
}

/**
 * Assemble the text part of the analysis request. Optional blocks are left
 * out entirely when their input is blank.
 */
export function buildAnalysisPrompt(input: AnalysisPromptInput): string {
  const sections = [ANALYST_PREAMBLE, `**PITCH DECK CONTENT:**\n${input.text}`];

  const linksSummary = input.linksSummary?.trim();
  if (linksSummary) {
    sections.push(linksSummary);
  }

  const enrichmentText = input.enrichmentText?.trim();
  if (enrichmentText) {
    sections.push(ONLINE_RESEARCH_INSTRUCTIONS, enrichmentText);
  }

  sections.push(ANALYSIS_RUBRIC);

  if (input.hasImages) {
    sections.push(IMAGES_NOTE);
  }

  sections.push(OUTPUT_FORMAT_INSTRUCTIONS);

  return sections.join('\n\n');
}
