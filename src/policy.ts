export function getNoContentMessage(): string {
  return "I don't have access to your content library yet. Add a page, some text, or crawl a site first!";
}

export function getInsufficientInfoMessage(): string {
  return "I don't have enough information in your library to answer that. Try adding more content on this topic.";
}

export function getModelErrorMessage(detail: string): string {
  return `Sorry, I encountered an error while answering: ${detail}`;
}
